import { Schema, model, type InferSchemaType } from "mongoose";

const NoteSchema = new Schema({
  slug: { type: String, required: true, unique: true },
  author: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
  title: { type: String, required: true, trim: true, maxlength: 200 },
  body: { type: String, default: "" },

  draft: { type: Boolean, default: false, index: true },
  pin: { type: Boolean, default: false },
  anonymous: { type: Boolean, default: false },
  views: { type: Number, default: 0 },

  likes: [{ type: Schema.Types.ObjectId, ref: "User" }],
  bookmarks: [{ type: Schema.Types.ObjectId, ref: "User" }],

  parent: { type: Schema.Types.ObjectId, ref: "Note", default: null },
  source: { type: Schema.Types.ObjectId, ref: "Source", default: null },
  tags: { type: [String], default: [], index: true },

  createdAt: { type: Date, default: Date.now, index: true },
  updatedAt: { type: Date, default: Date.now },
});

export type Note = InferSchemaType<typeof NoteSchema>;
export const NoteModel = model("Note", NoteSchema);
