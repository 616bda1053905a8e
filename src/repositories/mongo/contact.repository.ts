import type { Types } from "mongoose";
import { ContactModel, type Contact } from "../../models/contact.model.js";
import type { ContactRecord, ContactRepository } from "../types.js";

type ContactDoc = Contact & { _id: Types.ObjectId };

const toRecord = (doc: ContactDoc): ContactRecord => ({
  id: doc._id.toString(),
  followerId: doc.follower.toString(),
  followedId: doc.followed.toString(),
  createdAt: doc.createdAt,
});

export const mongoContactRepository: ContactRepository = {
  async find(followerId, followedId) {
    const contact = await ContactModel.findOne({ follower: followerId, followed: followedId });
    return contact ? toRecord(contact) : null;
  },

  async create(followerId, followedId) {
    const contact = await ContactModel.create({ follower: followerId, followed: followedId });
    return toRecord(contact);
  },

  async delete(id) {
    await ContactModel.deleteOne({ _id: id });
  },

  async listFollowing(followerId) {
    const contacts = await ContactModel.find({ follower: followerId }).sort({ createdAt: -1 });
    return contacts.map(toRecord);
  },

  async listFollowers(followedId) {
    const contacts = await ContactModel.find({ followed: followedId }).sort({ createdAt: -1 });
    return contacts.map(toRecord);
  },
};
