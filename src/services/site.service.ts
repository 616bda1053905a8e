import { env } from "../config/env.js";
import { getRepositories } from "../repositories/index.js";

const escapeXml = (value: string) =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");

const urlEntry = (loc: string, lastmod?: Date) =>
  [
    "  <url>",
    `    <loc>${escapeXml(loc)}</loc>`,
    ...(lastmod ? [`    <lastmod>${lastmod.toISOString().slice(0, 10)}</lastmod>`] : []),
    "  </url>",
  ].join("\n");

/**
 * Public notes and every source, under the default language.
 */
export async function buildSitemap(): Promise<string> {
  const { notes, sources } = getRepositories();
  const [noteRecords, sourceRecords] = await Promise.all([
    notes.list({ draft: false }),
    sources.list(),
  ]);
  const base = `${env.SITE_URL}/${env.DEFAULT_LANGUAGE}`;

  const entries = [
    ...noteRecords.map((note) => urlEntry(`${base}/notes/${note.slug}/`, note.updatedAt)),
    ...sourceRecords.map((source) => urlEntry(`${base}/sources/${source.slug}/`)),
  ];

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
    ...entries,
    "</urlset>",
    "",
  ].join("\n");
}

export function buildRobots(): string {
  return [
    "User-agent: *",
    ...env.LANGUAGES.flatMap((language) => [
      `Disallow: /${language}/users/signup/`,
      `Disallow: /${language}/me/`,
      `Disallow: /${language}/feed/`,
    ]),
    "",
    `Sitemap: ${env.SITE_URL}/sitemap.xml`,
    "",
  ].join("\n");
}
