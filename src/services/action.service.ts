import { getRepositories } from "../repositories/index.js";
import type { ActionRecord, ActionVerb, NewAction, ObjectRef } from "../repositories/types.js";
import { presentUsers, type PublicUser } from "./user.service.js";

// Identical actions within this window are recorded once.
const DUPLICATE_WINDOW_MS = 60 * 1000;

export const FEED_PAGE_SIZE = 20;

export const userRef = (id: string): ObjectRef => ({ kind: "User", id });
export const noteRef = (id: string): ObjectRef => ({ kind: "Note", id });

/**
 * Records `actor verb target` in the activity log.
 * Returns null when the same action was already recorded moments ago.
 */
export async function createAction(actor: ObjectRef | null, verb: ActionVerb, target: ObjectRef | null = null) {
  const { actions } = getRepositories();
  const data: NewAction = { actor, verb, target };

  const since = new Date(Date.now() - DUPLICATE_WINDOW_MS);
  if (await actions.existsSince(data, since)) return null;

  return actions.create(data);
}

type TargetSummary =
  | { kind: "User"; user: PublicUser }
  | { kind: "Note"; slug: string; title: string }
  | { kind: "Source"; slug: string; title: string };

export type FeedItem = {
  id: string;
  actor: PublicUser | null;
  verb: ActionVerb;
  target: TargetSummary | null;
  createdAt: Date;
};

const idsOfKind = (records: ActionRecord[], kind: ObjectRef["kind"]) => {
  const ids = new Set<string>();
  for (const record of records) {
    if (record.actor?.kind === kind) ids.add(record.actor.id);
    if (record.target?.kind === kind) ids.add(record.target.id);
  }
  return [...ids];
};

async function presentActions(records: ActionRecord[]): Promise<FeedItem[]> {
  const { notes, sources } = getRepositories();
  const [users, noteRecords, sourceRecords] = await Promise.all([
    presentUsers(idsOfKind(records, "User")),
    notes.findManyByIds(idsOfKind(records, "Note")),
    sources.findManyByIds(idsOfKind(records, "Source")),
  ]);
  const noteById = new Map(noteRecords.map((note) => [note.id, note]));
  const sourceById = new Map(sourceRecords.map((source) => [source.id, source]));

  const summarize = (actor: ObjectRef | null, ref: ObjectRef | null): TargetSummary | null => {
    if (!ref) return null;
    switch (ref.kind) {
      case "User": {
        const user = users.get(ref.id);
        return user ? { kind: "User", user } : null;
      }
      case "Note": {
        const note = noteById.get(ref.id);
        if (!note || note.draft) return null;
        // An anonymous note next to its own author would give the author away.
        if (note.anonymous && actor?.kind === "User" && actor.id === note.authorId) return null;
        return { kind: "Note", slug: note.slug, title: note.title };
      }
      case "Source": {
        const source = sourceById.get(ref.id);
        return source ? { kind: "Source", slug: source.slug, title: source.title } : null;
      }
    }
  };

  return records.map((record) => ({
    id: record.id,
    actor: record.actor?.kind === "User" ? users.get(record.actor.id) ?? null : null,
    verb: record.verb,
    target: summarize(record.actor, record.target),
    createdAt: record.createdAt,
  }));
}

/**
 * Actions of the users `userId` follows, newest first.
 */
export async function getFeed(userId: string, page: number) {
  const { contacts, actions } = getRepositories();
  const following = await contacts.listFollowing(userId);
  const actors = following.map((contact) => userRef(contact.followedId));

  const total = await actions.countByActors(actors);
  const records = await actions.listByActors(actors, {
    skip: (page - 1) * FEED_PAGE_SIZE,
    limit: FEED_PAGE_SIZE,
  });

  return {
    actions: await presentActions(records),
    pagination: {
      page,
      pages: Math.max(1, Math.ceil(total / FEED_PAGE_SIZE)),
      total,
      perPage: FEED_PAGE_SIZE,
    },
  };
}
