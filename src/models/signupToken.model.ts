import { Schema, model, type InferSchemaType } from "mongoose";

const SignupTokenSchema = new Schema({
  token: { type: String, required: true, unique: true },
  email: { type: String, required: true, lowercase: true, index: true },
  createdAt: { type: Date, default: Date.now },
});

export type SignupToken = InferSchemaType<typeof SignupTokenSchema>;
export const SignupTokenModel = model("SignupToken", SignupTokenSchema);
