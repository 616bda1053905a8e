import createError from "http-errors";
import { getRepositories } from "../repositories/index.js";
import type {
  NoteFilter,
  NoteOrder,
  NoteRecord,
  SourceRecord,
  UserRecord,
} from "../repositories/types.js";
import type { NoteInput } from "../schemas/note.schema.js";
import { cacheQuery } from "../utils/cache.js";
import { normalizeTag, slugify, uniqueSlug } from "../utils/slug.js";
import { createAction, noteRef, userRef } from "./action.service.js";
import { presentUsers, type PublicUser } from "./user.service.js";

export const NOTES_PER_PAGE = 100;

// Cached querysets live for three days
const CACHED_QUERY_TTL = 60 * 60 * 24 * 3;

// Only ids are cached; the notes are reloaded so that edits and deletions show at once.
const popularNoteIds = cacheQuery(CACHED_QUERY_TTL, () => "popular", async () => {
  const notes = await getRepositories().notes.list({ draft: false }, { order: "views", limit: 10 });
  return notes.map((note) => note.id);
});

/**
 * The most viewed published notes, as ranked when the cache was filled.
 */
export async function popularNotes(): Promise<NoteRecord[]> {
  const ids = await popularNoteIds();
  const records = await getRepositories().notes.findManyByIds(ids);
  const byId = new Map(records.map((note) => [note.id, note]));

  return ids.flatMap((id) => {
    const note = byId.get(id);
    return note && !note.draft ? [note] : [];
  });
}

export const getTopTags = cacheQuery(CACHED_QUERY_TTL, (limit: number) => `top:${limit}`, (limit: number) =>
  getRepositories().notes.topTags(limit)
);

export type PresentedSource = Omit<SourceRecord, "id">;

export type PresentedNote = {
  slug: string;
  title: string;
  body: string;
  author: PublicUser | null;
  draft: boolean;
  pin: boolean;
  anonymous: boolean;
  views: number;
  likes: number;
  liked: boolean;
  bookmarked: boolean;
  tags: string[];
  source: PresentedSource | null;
  parent: { slug: string; title: string } | null;
  createdAt: Date;
  updatedAt: Date;
};

const toPresentedSource = ({ id: _id, ...source }: SourceRecord): PresentedSource => source;

/**
 * Shapes notes for a viewer: anonymous authors stay hidden from everybody but
 * themselves, likes become a count plus the viewer's own flags.
 */
export async function presentNotes(records: NoteRecord[], viewerId: string | null): Promise<PresentedNote[]> {
  const { notes, sources } = getRepositories();
  const sourceIds = [...new Set(records.flatMap((note) => (note.sourceId ? [note.sourceId] : [])))];
  const parentIds = [...new Set(records.flatMap((note) => (note.parentId ? [note.parentId] : [])))];

  const [authors, sourceRecords, parents] = await Promise.all([
    presentUsers(records.map((note) => note.authorId)),
    sources.findManyByIds(sourceIds),
    notes.findManyByIds(parentIds),
  ]);
  const sourceById = new Map(sourceRecords.map((source) => [source.id, source]));
  const parentById = new Map(parents.map((parent) => [parent.id, parent]));

  return records.map((note) => {
    const isAuthor = viewerId === note.authorId;
    const source = note.sourceId ? sourceById.get(note.sourceId) : undefined;
    const parent = note.parentId ? parentById.get(note.parentId) : undefined;

    return {
      slug: note.slug,
      title: note.title,
      body: note.body,
      author: note.anonymous && !isAuthor ? null : authors.get(note.authorId) ?? null,
      draft: note.draft,
      pin: note.pin,
      anonymous: note.anonymous,
      views: note.views,
      likes: note.likes.length,
      liked: viewerId !== null && note.likes.includes(viewerId),
      bookmarked: viewerId !== null && note.bookmarks.includes(viewerId),
      tags: note.tags,
      source: source ? toPresentedSource(source) : null,
      parent: parent && (!parent.draft || parent.authorId === viewerId)
        ? { slug: parent.slug, title: parent.title }
        : null,
      createdAt: note.createdAt,
      updatedAt: note.updatedAt,
    };
  });
}

export async function presentNote(note: NoteRecord, viewerId: string | null): Promise<PresentedNote> {
  const [presented] = await presentNotes([note], viewerId);
  if (!presented) throw new Error(`Failed to present note ${note.slug}`);
  return presented;
}

export type Pagination = { page: number; pages: number; total: number; perPage: number };

/**
 * One page of notes matching `filter`, in the requested order.
 * Pages past the last one are 404, like an out-of-range paginator.
 */
export async function listNotes(
  filter: NoteFilter,
  query: { order: NoteOrder; page: number },
  viewerId: string | null
): Promise<{ notes: PresentedNote[]; pagination: Pagination }> {
  const { notes } = getRepositories();
  const total = await notes.count(filter);
  const pages = Math.max(1, Math.ceil(total / NOTES_PER_PAGE));
  if (query.page > pages) throw createError(404, "Invalid page");

  const records = await notes.list(filter, {
    order: query.order,
    skip: (query.page - 1) * NOTES_PER_PAGE,
    limit: NOTES_PER_PAGE,
  });

  return {
    notes: await presentNotes(records, viewerId),
    pagination: { page: query.page, pages, total, perPage: NOTES_PER_PAGE },
  };
}

export async function getSidenotes(viewerId: string | null, count = 5) {
  const popular = await popularNotes();
  return presentNotes(popular.slice(0, count), viewerId);
}

/**
 * A note as `viewerId` may see it: drafts exist only for their author.
 */
export async function getVisibleNote(slug: string, viewerId: string | null) {
  const note = await getRepositories().notes.findBySlug(slug);
  if (!note || (note.draft && note.authorId !== viewerId)) {
    throw createError(404, "Note not found");
  }
  return note;
}

async function getOwnNote(slug: string, userId: string) {
  const note = await getRepositories().notes.findBySlug(slug);
  if (!note) throw createError(404, "Note not found");
  if (note.authorId !== userId) {
    throw createError(403, "Only the author can change this note");
  }
  return note;
}

/**
 * Note details. Every visit of somebody other than the author counts as a view.
 */
export async function viewNote(slug: string, viewerId: string | null) {
  const note = await getVisibleNote(slug, viewerId);
  if (note.authorId !== viewerId) {
    await getRepositories().notes.incrementViews(note.id);
  }
  return note;
}

export type NoteFormInitial = {
  title: string;
  body: string;
  tags: string[];
  source: PresentedSource | null;
  parent: string | null;
};

const emptyInitial = (): NoteFormInitial => ({ title: "", body: "", tags: [], source: null, parent: null });

/**
 * Initial values of the note form, pre-populated from `?source=` and `?tag=`.
 * Unknown slugs are ignored.
 */
export async function getInitialForm(query: { source?: string; tag?: string }) {
  const { notes, sources } = getRepositories();
  const initial = emptyInitial();

  if (query.source) {
    const source = await sources.findBySlug(query.source);
    if (source) initial.source = toPresentedSource(source);
  }
  if (query.tag) {
    const tag = normalizeTag(query.tag);
    if (tag && (await notes.count({ tag, draft: false })) > 0) initial.tags = [tag];
  }
  return initial;
}

export async function getForkInitial(slug: string, viewerId: string) {
  const note = await getVisibleNote(slug, viewerId);
  const initial: NoteFormInitial = {
    ...emptyInitial(),
    title: note.title,
    body: note.body,
    tags: [...note.tags],
    parent: note.slug,
  };

  if (note.sourceId) {
    const source = await getRepositories().sources.findById(note.sourceId);
    if (source) initial.source = toPresentedSource(source);
  }
  return initial;
}

const normalizeTags = (tags: string[]) => [...new Set(tags.map(normalizeTag).filter(Boolean))];

async function uniqueSourceSlug(title: string) {
  const { sources } = getRepositories();
  const base = slugify(title) || "source";
  if (!(await sources.existsBySlug(base))) return base;
  for (let suffix = 2; ; suffix++) {
    const candidate = `${base}-${suffix}`;
    if (!(await sources.existsBySlug(candidate))) return candidate;
  }
}

/**
 * The source a note form refers to, matched by title or created from the form.
 */
async function resolveSource(input: NoteInput["source"]): Promise<string | null> {
  if (!input) return null;
  const { sources } = getRepositories();

  const existing = await sources.findByTitle(input.title);
  if (existing) return existing.id;

  const created = await sources.create({
    title: input.title,
    slug: await uniqueSourceSlug(input.title),
    link: input.link,
    description: input.description,
    type: input.type,
  });
  return created.id;
}

export async function createNote(author: UserRecord, input: NoteInput, parentSlug: string | null = null) {
  const { notes } = getRepositories();

  let parentId: string | null = null;
  if (parentSlug) {
    const parent = await getVisibleNote(parentSlug, author.id);
    parentId = parent.id;
  }

  const note = await notes.create({
    slug: await uniqueSlug(input.title, (slug) => notes.existsBySlug(slug)),
    authorId: author.id,
    title: input.title,
    body: input.body,
    draft: input.saveDraft,
    anonymous: input.anonymous,
    parentId,
    sourceId: await resolveSource(input.source),
    tags: normalizeTags(input.tags),
  });

  if (!note.draft && !note.anonymous) {
    await createAction(userRef(author.id), "creates", noteRef(note.id));
  }
  return note;
}

export async function updateNote(slug: string, userId: string, input: NoteInput) {
  const note = await getOwnNote(slug, userId);

  const updated = await getRepositories().notes.update(note.id, {
    title: input.title,
    body: input.body,
    draft: input.saveDraft,
    anonymous: input.anonymous,
    sourceId: await resolveSource(input.source),
    tags: normalizeTags(input.tags),
  });
  if (!updated) throw createError(404, "Note not found");

  if (note.draft && !updated.draft && !updated.anonymous) {
    await createAction(userRef(userId), "creates", noteRef(updated.id));
  }
  return updated;
}

export async function deleteNote(slug: string, userId: string) {
  const note = await getOwnNote(slug, userId);
  await getRepositories().notes.delete(note.id);
}

/**
 * Pin or unpin one of the viewer's notes. Returns the new state, or null when
 * the note belongs to somebody else.
 */
export async function togglePin(slug: string, userId: string): Promise<boolean | null> {
  const { notes } = getRepositories();
  const note = await notes.findBySlug(slug);
  if (!note) throw createError(404, "Note not found");
  if (note.authorId !== userId) return null;

  const pin = !note.pin;
  await notes.update(note.id, { pin });
  return pin;
}

const toggleMembership = async (slug: string, userId: string, field: "likes" | "bookmarks") => {
  const note = await getVisibleNote(slug, userId);
  const present = !note[field].includes(userId);

  await getRepositories().notes.setMembership(note.id, field, userId, present);
  if (present) {
    await createAction(userRef(userId), field, noteRef(note.id));
  }
  return present;
};

export const toggleLike = (slug: string, userId: string) => toggleMembership(slug, userId, "likes");

export const toggleBookmark = (slug: string, userId: string) => toggleMembership(slug, userId, "bookmarks");

const FILE_TYPES = {
  txt: { contentType: "text/plain; charset=utf-8", render: (note: NoteRecord) => `${note.title}\n\n${note.body}\n` },
  md: { contentType: "text/markdown; charset=utf-8", render: (note: NoteRecord) => `# ${note.title}\n\n${note.body}\n` },
} as const;

type FileType = keyof typeof FILE_TYPES;

const isFileType = (value: string): value is FileType => Object.hasOwn(FILE_TYPES, value);

export type NoteFile = { filename: string; contentType: string; content: string };

/**
 * Renders a note as a downloadable file. Null for unknown file types and for
 * other people's drafts.
 */
export async function generateNoteFile(slug: string, filetype: string, viewerId: string): Promise<NoteFile | null> {
  const note = await getRepositories().notes.findBySlug(slug);
  if (!note) throw createError(404, "Note not found");
  if (!isFileType(filetype) || (note.draft && note.authorId !== viewerId)) return null;

  const { contentType, render } = FILE_TYPES[filetype];
  await createAction(userRef(viewerId), "downloads", noteRef(note.id));

  return { filename: `${note.slug}.${filetype}`, contentType, content: render(note) };
}
