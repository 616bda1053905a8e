import { Schema, model, type InferSchemaType } from "mongoose";
import { ACTION_VERBS, OBJECT_KINDS } from "../repositories/types.js";

// Actor and target are polymorphic: the model name travels next to the id.
const ActionSchema = new Schema({
  actorModel: { type: String, enum: OBJECT_KINDS },
  actorId: { type: Schema.Types.ObjectId, refPath: "actorModel", default: null, index: true },
  verb: { type: String, enum: ACTION_VERBS, required: true },
  targetModel: { type: String, enum: OBJECT_KINDS },
  targetId: { type: Schema.Types.ObjectId, refPath: "targetModel", default: null, index: true },
  createdAt: { type: Date, default: Date.now, index: true },
});

export type Action = InferSchemaType<typeof ActionSchema>;
export const ActionModel = model("Action", ActionSchema);
