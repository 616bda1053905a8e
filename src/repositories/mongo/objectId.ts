import { Types } from "mongoose";

export const toObjectId = (id: string) => new Types.ObjectId(id);

export const toIdString = (id: Types.ObjectId | null | undefined): string | null =>
  id ? id.toString() : null;
