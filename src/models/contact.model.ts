import { Schema, model, type InferSchemaType } from "mongoose";

const ContactSchema = new Schema({
  follower: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
  followed: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
  createdAt: { type: Date, default: Date.now, index: true },
});

ContactSchema.index({ follower: 1, followed: 1 }, { unique: true });

export type Contact = InferSchemaType<typeof ContactSchema>;
export const ContactModel = model("Contact", ContactSchema);
