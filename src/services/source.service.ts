import createError from "http-errors";
import { getRepositories } from "../repositories/index.js";
import { SOURCE_TYPE_LABELS } from "../repositories/types.js";

export const sourceTypes = () => ({ ...SOURCE_TYPE_LABELS });

export async function getSourceBySlug(slug: string) {
  const source = await getRepositories().sources.findBySlug(slug);
  if (!source) throw createError(404, "Source not found");
  return source;
}
