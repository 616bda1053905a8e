import { Schema, model, type InferSchemaType } from "mongoose";
import { SOURCE_TYPES } from "../repositories/types.js";

const SourceSchema = new Schema({
  title: { type: String, required: true, unique: true, trim: true, maxlength: 255 },
  slug: { type: String, required: true, unique: true },
  link: { type: String, default: "" },
  description: { type: String, default: "" },
  type: { type: String, enum: SOURCE_TYPES, default: "other" },
});

export type Source = InferSchemaType<typeof SourceSchema>;
export const SourceModel = model("Source", SourceSchema);
