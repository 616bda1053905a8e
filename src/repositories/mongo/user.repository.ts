import type { Types } from "mongoose";
import { UserModel, type User } from "../../models/user.model.js";
import type { NewUser, UserPatch, UserRecord, UserRepository } from "../types.js";

type UserDoc = User & { _id: Types.ObjectId };

const toRecord = (doc: UserDoc): UserRecord => ({
  id: doc._id.toString(),
  email: doc.email,
  username: doc.username,
  firstName: doc.firstName,
  lastName: doc.lastName,
  passwordHash: doc.passwordHash ?? null,
  isStaff: doc.isStaff,
  bio: doc.bio,
  avatar: doc.avatar,
  tags: [...doc.tags],
  createdAt: doc.createdAt,
});

export const mongoUserRepository: UserRepository = {
  async create(data: NewUser) {
    const user = await UserModel.create(data);
    return toRecord(user);
  },

  async findById(id) {
    const user = await UserModel.findById(id);
    return user ? toRecord(user) : null;
  },

  async findByEmail(email) {
    const user = await UserModel.findOne({ email: email.toLowerCase().trim() });
    return user ? toRecord(user) : null;
  },

  async findByUsername(username) {
    const user = await UserModel.findOne({ username });
    return user ? toRecord(user) : null;
  },

  async findManyByIds(ids) {
    if (ids.length === 0) return [];
    const users = await UserModel.find({ _id: { $in: ids } });
    return users.map(toRecord);
  },

  async existsByEmail(email) {
    const exists = await UserModel.exists({ email: email.toLowerCase().trim() });
    return exists !== null;
  },

  async existsByUsername(username) {
    const exists = await UserModel.exists({ username });
    return exists !== null;
  },

  async update(id, patch: UserPatch) {
    const user = await UserModel.findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true });
    return user ? toRecord(user) : null;
  },

  async setTagSubscription(id, tag, subscribed) {
    const update = subscribed ? { $addToSet: { tags: tag } } : { $pull: { tags: tag } };
    await UserModel.updateOne({ _id: id }, update);
  },
};
