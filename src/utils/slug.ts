import { v4 as uuidv4 } from "uuid";

/**
 * Lower-cases, strips accents and joins the remaining words with "-".
 */
export const slugify = (value: string): string =>
  value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .trim()
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "");

export const normalizeTag = (value: string): string => slugify(value);

/**
 * Slug from `title` with a short random suffix, retried until `isTaken` says it is free.
 */
export const uniqueSlug = async (title: string, isTaken: (slug: string) => Promise<boolean>): Promise<string> => {
  const base = slugify(title).slice(0, 60) || "note";
  for (;;) {
    const slug = `${base}-${uuidv4().slice(0, 8)}`;
    if (!(await isTaken(slug))) return slug;
  }
};
