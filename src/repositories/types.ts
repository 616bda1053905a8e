export const SOURCE_TYPES = ["book", "article", "video", "podcast", "course", "website", "other"] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export const SOURCE_TYPE_LABELS: Record<SourceType, string> = {
  book: "Book",
  article: "Article",
  video: "Video",
  podcast: "Podcast",
  course: "Course",
  website: "Website",
  other: "Other",
};

export const ACTION_VERBS = ["new", "creates", "follows", "bookmarks", "likes", "downloads"] as const;
export type ActionVerb = (typeof ACTION_VERBS)[number];

export const OBJECT_KINDS = ["User", "Note", "Source"] as const;
export type ObjectKind = (typeof OBJECT_KINDS)[number];

export const NOTE_ORDERS = ["-datetime_created", "views", "likes"] as const;
export type NoteOrder = (typeof NOTE_ORDERS)[number];

export interface UserRecord {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  passwordHash: string | null;
  isStaff: boolean;
  bio: string;
  avatar: string;
  tags: string[];
  createdAt: Date;
}

export type NewUser = Pick<UserRecord, "email" | "username" | "firstName" | "passwordHash">
  & Partial<Pick<UserRecord, "lastName" | "isStaff" | "bio" | "avatar">>;

export type UserPatch = Partial<Pick<UserRecord, "bio" | "avatar" | "passwordHash">>;

export interface NoteRecord {
  id: string;
  slug: string;
  authorId: string;
  title: string;
  body: string;
  draft: boolean;
  pin: boolean;
  anonymous: boolean;
  views: number;
  likes: string[];
  bookmarks: string[];
  parentId: string | null;
  sourceId: string | null;
  tags: string[];
  createdAt: Date;
  updatedAt: Date;
}

export type NewNote = Pick<NoteRecord, "slug" | "authorId" | "title" | "body" | "draft" | "anonymous" | "parentId" | "sourceId" | "tags">;

export type NotePatch = Partial<Pick<NoteRecord, "title" | "body" | "draft" | "pin" | "anonymous" | "sourceId" | "tags">>;

export interface NoteFilter {
  authorId?: string;
  draft?: boolean;
  anonymous?: boolean;
  pin?: boolean;
  tag?: string;
  tagsIn?: string[];
  sourceId?: string;
  bookmarkedBy?: string;
  /** Published notes plus this user's own drafts. */
  visibleTo?: string;
}

export interface ListOptions {
  order?: NoteOrder;
  skip?: number;
  limit?: number;
}

export interface TagCount {
  name: string;
  count: number;
}

export interface SourceRecord {
  id: string;
  title: string;
  slug: string;
  link: string;
  description: string;
  type: SourceType;
}

export type NewSource = Omit<SourceRecord, "id">;

export interface ContactRecord {
  id: string;
  followerId: string;
  followedId: string;
  createdAt: Date;
}

export interface ObjectRef {
  kind: ObjectKind;
  id: string;
}

export interface ActionRecord {
  id: string;
  actor: ObjectRef | null;
  verb: ActionVerb;
  target: ObjectRef | null;
  createdAt: Date;
}

export type NewAction = Omit<ActionRecord, "id" | "createdAt">;

export interface SignupTokenRecord {
  id: string;
  token: string;
  email: string;
  createdAt: Date;
}

export interface SessionRecord {
  id: string;
  jti: string;
  userId: string;
  revoked: boolean;
  expiresAt: Date;
  ip: string | null;
  deviceInfo: string;
}

export type NewSession = Omit<SessionRecord, "id" | "revoked">;

export interface UserRepository {
  create(data: NewUser): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  findManyByIds(ids: string[]): Promise<UserRecord[]>;
  existsByEmail(email: string): Promise<boolean>;
  existsByUsername(username: string): Promise<boolean>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
  setTagSubscription(id: string, tag: string, subscribed: boolean): Promise<void>;
}

export interface NoteRepository {
  create(data: NewNote): Promise<NoteRecord>;
  findById(id: string): Promise<NoteRecord | null>;
  findBySlug(slug: string): Promise<NoteRecord | null>;
  findManyByIds(ids: string[]): Promise<NoteRecord[]>;
  existsBySlug(slug: string): Promise<boolean>;
  list(filter: NoteFilter, options?: ListOptions): Promise<NoteRecord[]>;
  count(filter: NoteFilter): Promise<number>;
  update(id: string, patch: NotePatch): Promise<NoteRecord | null>;
  delete(id: string): Promise<void>;
  incrementViews(id: string): Promise<void>;
  setMembership(id: string, field: "likes" | "bookmarks", userId: string, present: boolean): Promise<void>;
  topTags(limit: number): Promise<TagCount[]>;
}

export interface SourceRepository {
  create(data: NewSource): Promise<SourceRecord>;
  findById(id: string): Promise<SourceRecord | null>;
  findBySlug(slug: string): Promise<SourceRecord | null>;
  findByTitle(title: string): Promise<SourceRecord | null>;
  findManyByIds(ids: string[]): Promise<SourceRecord[]>;
  existsBySlug(slug: string): Promise<boolean>;
  list(): Promise<SourceRecord[]>;
}

export interface ContactRepository {
  find(followerId: string, followedId: string): Promise<ContactRecord | null>;
  create(followerId: string, followedId: string): Promise<ContactRecord>;
  delete(id: string): Promise<void>;
  /** Edges leaving `followerId`, newest first. */
  listFollowing(followerId: string): Promise<ContactRecord[]>;
  /** Edges reaching `followedId`, newest first. */
  listFollowers(followedId: string): Promise<ContactRecord[]>;
}

export interface ActionRepository {
  create(data: NewAction): Promise<ActionRecord>;
  existsSince(data: NewAction, since: Date): Promise<boolean>;
  listByActors(actors: ObjectRef[], options: { skip: number; limit: number }): Promise<ActionRecord[]>;
  countByActors(actors: ObjectRef[]): Promise<number>;
}

export interface SignupTokenRepository {
  create(token: string, email: string): Promise<SignupTokenRecord>;
  findByToken(token: string): Promise<SignupTokenRecord | null>;
  deleteByEmail(email: string): Promise<void>;
}

export interface SessionRepository {
  create(data: NewSession): Promise<SessionRecord>;
  findByJti(jti: string): Promise<SessionRecord | null>;
  revoke(jti: string): Promise<void>;
}

export interface Repositories {
  users: UserRepository;
  notes: NoteRepository;
  sources: SourceRepository;
  contacts: ContactRepository;
  actions: ActionRepository;
  signupTokens: SignupTokenRepository;
  sessions: SessionRepository;
}
