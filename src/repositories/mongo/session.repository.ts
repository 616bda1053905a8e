import type { Types } from "mongoose";
import { SessionModel, type Session } from "../../models/session.model.js";
import type { SessionRecord, SessionRepository } from "../types.js";

type SessionDoc = Session & { _id: Types.ObjectId };

const toRecord = (doc: SessionDoc): SessionRecord => ({
  id: doc._id.toString(),
  jti: doc.jti,
  userId: doc.userId.toString(),
  revoked: doc.revoked,
  expiresAt: doc.expiresAt,
  ip: doc.ip ?? null,
  deviceInfo: doc.deviceInfo,
});

export const mongoSessionRepository: SessionRepository = {
  async create(data) {
    const session = await SessionModel.create(data);
    return toRecord(session);
  },

  async findByJti(jti) {
    const session = await SessionModel.findOne({ jti });
    return session ? toRecord(session) : null;
  },

  async revoke(jti) {
    await SessionModel.updateOne({ jti }, { revoked: true });
  },
};
