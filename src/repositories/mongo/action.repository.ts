import type { Types } from "mongoose";
import { ActionModel, type Action } from "../../models/action.model.js";
import {
  ACTION_VERBS,
  OBJECT_KINDS,
  type ActionRecord,
  type ActionRepository,
  type ActionVerb,
  type NewAction,
  type ObjectKind,
  type ObjectRef,
} from "../types.js";
import { toObjectId } from "./objectId.js";

type ActionDoc = Action & { _id: Types.ObjectId };

const isVerb = (value: unknown): value is ActionVerb => ACTION_VERBS.some((verb) => verb === value);
const isKind = (value: unknown): value is ObjectKind => OBJECT_KINDS.some((kind) => kind === value);

const toRef = (kind: unknown, id: Types.ObjectId | null | undefined): ObjectRef | null =>
  isKind(kind) && id ? { kind, id: id.toString() } : null;

const toRecord = (doc: ActionDoc): ActionRecord => {
  if (!isVerb(doc.verb)) throw new Error(`Unknown action verb: ${doc.verb}`);
  return {
    id: doc._id.toString(),
    actor: toRef(doc.actorModel, doc.actorId),
    verb: doc.verb,
    target: toRef(doc.targetModel, doc.targetId),
    createdAt: doc.createdAt,
  };
};

const toFields = (data: NewAction) => ({
  actorModel: data.actor?.kind,
  actorId: data.actor ? toObjectId(data.actor.id) : null,
  verb: data.verb,
  targetModel: data.target?.kind,
  targetId: data.target ? toObjectId(data.target.id) : null,
});

const actorsMatch = (actors: ObjectRef[]) => ({
  $or: actors.map((actor) => ({ actorModel: actor.kind, actorId: toObjectId(actor.id) })),
});

export const mongoActionRepository: ActionRepository = {
  async create(data) {
    const action = await ActionModel.create(toFields(data));
    return toRecord(action);
  },

  async existsSince(data, since) {
    const { actorModel, actorId, verb, targetModel, targetId } = toFields(data);
    const exists = await ActionModel.exists({
      actorModel: actorModel ?? null,
      actorId,
      verb,
      targetModel: targetModel ?? null,
      targetId,
      createdAt: { $gte: since },
    });
    return exists !== null;
  },

  async listByActors(actors, { skip, limit }) {
    if (actors.length === 0) return [];
    const actions = await ActionModel.find(actorsMatch(actors))
      .sort({ createdAt: -1, _id: -1 })
      .skip(skip)
      .limit(limit);
    return actions.map(toRecord);
  },

  async countByActors(actors) {
    if (actors.length === 0) return 0;
    return ActionModel.countDocuments(actorsMatch(actors));
  },
};
