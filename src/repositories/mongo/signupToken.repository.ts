import type { Types } from "mongoose";
import { SignupTokenModel, type SignupToken } from "../../models/signupToken.model.js";
import type { SignupTokenRecord, SignupTokenRepository } from "../types.js";

type SignupTokenDoc = SignupToken & { _id: Types.ObjectId };

const toRecord = (doc: SignupTokenDoc): SignupTokenRecord => ({
  id: doc._id.toString(),
  token: doc.token,
  email: doc.email,
  createdAt: doc.createdAt,
});

export const mongoSignupTokenRepository: SignupTokenRepository = {
  async create(token, email) {
    const record = await SignupTokenModel.create({ token, email });
    return toRecord(record);
  },

  async findByToken(token) {
    const record = await SignupTokenModel.findOne({ token });
    return record ? toRecord(record) : null;
  },

  async deleteByEmail(email) {
    await SignupTokenModel.deleteMany({ email: email.toLowerCase() });
  },
};
