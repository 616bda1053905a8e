import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { env } from "./env.js";

const CatalogSchema = z.record(z.string(), z.string());
export type Catalog = z.infer<typeof CatalogSchema>;

const catalogs = new Map<string, Catalog>();

export const isLanguage = (value: string) => env.LANGUAGES.includes(value);

/**
 * Message catalog of `language`, read from LOCALE_DIR/<language>.json once.
 * Languages without a catalog get an empty one.
 */
export function loadCatalog(language: string): Catalog {
  const cached = catalogs.get(language);
  if (cached) return cached;

  const file = path.resolve(env.LOCALE_DIR, `${language}.json`);
  let catalog: Catalog = {};
  try {
    catalog = CatalogSchema.parse(JSON.parse(readFileSync(file, "utf8")));
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) throw err;
    console.warn(`[I18N]: No catalog for '${language}' at ${file}`);
  }

  catalogs.set(language, catalog);
  return catalog;
}

export const translate = (language: string, message: string) => loadCatalog(language)[message] ?? message;
