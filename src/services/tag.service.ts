import createError from "http-errors";
import { getRepositories } from "../repositories/index.js";
import { normalizeTag } from "../utils/slug.js";

/**
 * The tag behind `slug`; a tag exists while a published note carries it.
 */
export async function getTag(slug: string) {
  const name = normalizeTag(slug);
  const count = name ? await getRepositories().notes.count({ tag: name, draft: false }) : 0;
  if (count === 0) throw createError(404, "Tag not found");
  return name;
}

/**
 * Subscribe the user to the tag, or unsubscribe when already subscribed.
 */
export async function toggleTagSubscription(userId: string, slug: string) {
  const { users } = getRepositories();
  const tag = await getTag(slug);
  const user = await users.findById(userId);
  if (!user) throw createError(404, "User not found");

  const subscribed = !user.tags.includes(tag);
  await users.setTagSubscription(userId, tag, subscribed);
  return subscribed;
}
