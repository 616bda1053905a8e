import type { PipelineStage, Types } from "mongoose";
import { NoteModel, type Note } from "../../models/note.model.js";
import type { ListOptions, NewNote, NoteFilter, NoteOrder, NotePatch, NoteRecord, NoteRepository } from "../types.js";
import { toIdString, toObjectId } from "./objectId.js";

type NoteDoc = Note & { _id: Types.ObjectId };

const toRecord = (doc: NoteDoc): NoteRecord => ({
  id: doc._id.toString(),
  slug: doc.slug,
  authorId: doc.author.toString(),
  title: doc.title,
  body: doc.body,
  draft: doc.draft,
  pin: doc.pin,
  anonymous: doc.anonymous,
  views: doc.views,
  likes: doc.likes.map((id) => id.toString()),
  bookmarks: doc.bookmarks.map((id) => id.toString()),
  parentId: toIdString(doc.parent),
  sourceId: toIdString(doc.source),
  tags: [...doc.tags],
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

// Aggregation stages do not cast, so ids are converted here.
export const toMatch = (filter: NoteFilter): Record<string, unknown> => {
  const match: Record<string, unknown> = {};
  if (filter.authorId !== undefined) match.author = toObjectId(filter.authorId);
  if (filter.draft !== undefined) match.draft = filter.draft;
  if (filter.anonymous !== undefined) match.anonymous = filter.anonymous;
  if (filter.pin !== undefined) match.pin = filter.pin;
  if (filter.sourceId !== undefined) match.source = toObjectId(filter.sourceId);
  if (filter.bookmarkedBy !== undefined) match.bookmarks = toObjectId(filter.bookmarkedBy);
  if (filter.visibleTo !== undefined) {
    match.$or = [{ draft: false }, { author: toObjectId(filter.visibleTo) }];
  }
  if (filter.tag !== undefined && filter.tagsIn !== undefined) {
    match.$and = [{ tags: filter.tag }, { tags: { $in: filter.tagsIn } }];
  } else if (filter.tag !== undefined) {
    match.tags = filter.tag;
  } else if (filter.tagsIn !== undefined) {
    match.tags = { $in: filter.tagsIn };
  }
  return match;
};

const SORTS: Record<NoteOrder, Record<string, 1 | -1>> = {
  "-datetime_created": { createdAt: -1, _id: -1 },
  views: { views: -1, createdAt: -1, _id: -1 },
  likes: { likesCount: -1, createdAt: -1, _id: -1 },
};

export const listPipeline = (filter: NoteFilter, options: ListOptions = {}): PipelineStage[] => {
  const order = options.order ?? "-datetime_created";
  const pipeline: PipelineStage[] = [{ $match: toMatch(filter) }];

  if (order === "likes") {
    pipeline.push({ $addFields: { likesCount: { $size: "$likes" } } });
  }
  pipeline.push({ $sort: SORTS[order] });
  if (options.skip) pipeline.push({ $skip: options.skip });
  if (options.limit !== undefined) pipeline.push({ $limit: options.limit });
  return pipeline;
};

// Tags of published notes, most used first, ties by name.
export const topTagsPipeline = (limit: number): PipelineStage[] => [
  { $match: { draft: false } },
  { $unwind: "$tags" },
  { $group: { _id: "$tags", count: { $sum: 1 } } },
  { $sort: { count: -1, _id: 1 } },
  { $limit: limit },
];

export const mongoNoteRepository: NoteRepository = {
  async create(data: NewNote) {
    const note = await NoteModel.create({
      slug: data.slug,
      author: data.authorId,
      title: data.title,
      body: data.body,
      draft: data.draft,
      anonymous: data.anonymous,
      parent: data.parentId,
      source: data.sourceId,
      tags: data.tags,
    });
    return toRecord(note);
  },

  async findById(id) {
    const note = await NoteModel.findById(id);
    return note ? toRecord(note) : null;
  },

  async findBySlug(slug) {
    const note = await NoteModel.findOne({ slug });
    return note ? toRecord(note) : null;
  },

  async findManyByIds(ids) {
    if (ids.length === 0) return [];
    const notes = await NoteModel.find({ _id: { $in: ids } });
    return notes.map(toRecord);
  },

  async existsBySlug(slug) {
    const exists = await NoteModel.exists({ slug });
    return exists !== null;
  },

  async list(filter: NoteFilter, options: ListOptions = {}) {
    const docs = await NoteModel.aggregate<NoteDoc>(listPipeline(filter, options));
    return docs.map(toRecord);
  },

  async count(filter) {
    return NoteModel.countDocuments(toMatch(filter));
  },

  async update(id, patch: NotePatch) {
    const { sourceId, ...rest } = patch;
    const set: Record<string, unknown> = { ...rest, updatedAt: new Date() };
    if (sourceId !== undefined) set.source = sourceId;

    const note = await NoteModel.findByIdAndUpdate(id, { $set: set }, { new: true, runValidators: true });
    return note ? toRecord(note) : null;
  },

  async delete(id) {
    await NoteModel.deleteOne({ _id: id });
  },

  async incrementViews(id) {
    await NoteModel.updateOne({ _id: id }, { $inc: { views: 1 } });
  },

  async setMembership(id, field, userId, present) {
    const update = present
      ? { $addToSet: { [field]: toObjectId(userId) } }
      : { $pull: { [field]: toObjectId(userId) } };
    await NoteModel.updateOne({ _id: id }, update);
  },

  async topTags(limit) {
    const rows = await NoteModel.aggregate<{ _id: string; count: number }>(topTagsPipeline(limit));
    return rows.map((row) => ({ name: row._id, count: row.count }));
  },
};
