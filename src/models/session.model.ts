import { Schema, model, type InferSchemaType } from "mongoose";

const SessionSchema = new Schema({
  userId: { type: Schema.Types.ObjectId, ref: 'User', required: true, index: true },
  jti: { type: String, required: true, unique: true },
  revoked: { type: Boolean, default: false },
  expiresAt: { type: Date, required: true },
  deviceInfo: { type: String, default: "Unknown" },
  ip: { type: String, default: null },
}, { timestamps: true });

SessionSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export type Session = InferSchemaType<typeof SessionSchema>;
export const SessionModel = model('Session', SessionSchema);
export default SessionModel;
