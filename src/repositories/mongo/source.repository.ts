import type { Types } from "mongoose";
import { SourceModel, type Source } from "../../models/source.model.js";
import { SOURCE_TYPES, type SourceRecord, type SourceRepository, type SourceType } from "../types.js";

type SourceDoc = Source & { _id: Types.ObjectId };

const isSourceType = (value: unknown): value is SourceType =>
  SOURCE_TYPES.some((type) => type === value);

const toRecord = (doc: SourceDoc): SourceRecord => ({
  id: doc._id.toString(),
  title: doc.title,
  slug: doc.slug,
  link: doc.link,
  description: doc.description,
  type: isSourceType(doc.type) ? doc.type : "other",
});

export const mongoSourceRepository: SourceRepository = {
  async create(data) {
    const source = await SourceModel.create(data);
    return toRecord(source);
  },

  async findById(id) {
    const source = await SourceModel.findById(id);
    return source ? toRecord(source) : null;
  },

  async findBySlug(slug) {
    const source = await SourceModel.findOne({ slug });
    return source ? toRecord(source) : null;
  },

  async findByTitle(title) {
    const source = await SourceModel.findOne({ title: title.trim() });
    return source ? toRecord(source) : null;
  },

  async findManyByIds(ids) {
    if (ids.length === 0) return [];
    const sources = await SourceModel.find({ _id: { $in: ids } });
    return sources.map(toRecord);
  },

  async existsBySlug(slug) {
    const exists = await SourceModel.exists({ slug });
    return exists !== null;
  },

  async list() {
    const sources = await SourceModel.find().sort({ title: 1 });
    return sources.map(toRecord);
  },
};
