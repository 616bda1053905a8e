import createError from "http-errors";
import { getRepositories } from "../repositories/index.js";
import type { ContactRecord, UserPatch, UserRecord } from "../repositories/types.js";
import { unslugify, userSlug } from "../utils/username.js";
import { createAction, userRef } from "./action.service.js";

export type PublicUser = {
  id: string;
  username: string;
  slug: string;
  firstName: string;
  lastName: string;
  avatar: string;
};

export const presentUser = (user: UserRecord): PublicUser => ({
  id: user.id,
  username: user.username,
  slug: userSlug(user.username),
  firstName: user.firstName,
  lastName: user.lastName,
  avatar: user.avatar,
});

export async function presentUsers(ids: string[]): Promise<Map<string, PublicUser>> {
  const users = await getRepositories().users.findManyByIds([...new Set(ids)]);
  return new Map(users.map((user) => [user.id, presentUser(user)]));
}

/**
 * Look up a user by the slug used in profile URLs.
 */
export async function getUserBySlug(slug: string) {
  const user = await getRepositories().users.findByUsername(unslugify(slug));
  if (!user) throw createError(404, "User not found");
  return user;
}

/**
 * Profile header: public fields, bio, follower counts and whether the viewer follows.
 */
export async function getProfile(user: UserRecord, viewerId: string | null) {
  const { contacts } = getRepositories();
  const [followers, following, edge] = await Promise.all([
    contacts.listFollowers(user.id),
    contacts.listFollowing(user.id),
    viewerId ? contacts.find(viewerId, user.id) : Promise.resolve(null),
  ]);

  return {
    ...presentUser(user),
    bio: user.bio,
    createdAt: user.createdAt,
    followers: followers.length,
    following: following.length,
    isFollowed: edge !== null,
  };
}

/**
 * The viewer's own account, including the fields only they see.
 */
export async function getAccount(user: UserRecord) {
  return {
    ...(await getProfile(user, null)),
    email: user.email,
    tags: user.tags,
  };
}

export async function updateProfile(userId: string, patch: Pick<UserPatch, "bio" | "avatar">) {
  const user = await getRepositories().users.update(userId, patch);
  if (!user) throw createError(404, "User not found");
  return getAccount(user);
}

/**
 * Follow `slug` if the viewer does not follow them yet, unfollow otherwise.
 */
export async function toggleFollow(viewerId: string, slug: string) {
  const { contacts } = getRepositories();
  const target = await getUserBySlug(slug);
  if (target.id === viewerId) throw createError(400, "You cannot follow yourself");

  const edge = await contacts.find(viewerId, target.id);
  if (edge) {
    await contacts.delete(edge.id);
    return false;
  }

  await contacts.create(viewerId, target.id);
  await createAction(userRef(viewerId), "follows", userRef(target.id));
  return true;
}

async function presentEdges(edges: ContactRecord[], side: "followerId" | "followedId") {
  const users = await presentUsers(edges.map((edge) => edge[side]));
  return edges.flatMap((edge) => {
    const user = users.get(edge[side]);
    return user ? [{ ...user, since: edge.createdAt }] : [];
  });
}

export async function listFollowers(slug: string) {
  const user = await getUserBySlug(slug);
  const edges = await getRepositories().contacts.listFollowers(user.id);
  return presentEdges(edges, "followerId");
}

export async function listFollowing(slug: string) {
  const user = await getUserBySlug(slug);
  const edges = await getRepositories().contacts.listFollowing(user.id);
  return presentEdges(edges, "followedId");
}
