import { describe, expect, it } from "vitest";
import { normalizeTag, slugify, uniqueSlug } from "../../src/utils/slug.js";

describe("slugify", () => {
  it("lower-cases and joins words with dashes", () => {
    expect(slugify("Hello,  World!")).toBe("hello-world");
    expect(slugify("  -Already--dashed- ")).toBe("already-dashed");
  });

  it("strips accents and keeps other scripts", () => {
    expect(slugify("Café Crème")).toBe("cafe-creme");
    expect(slugify("Привет мир")).toBe("привет-мир");
  });

  it("normalizes tags the same way", () => {
    expect(normalizeTag("Reading Notes")).toBe("reading-notes");
    expect(normalizeTag("!!!")).toBe("");
  });
});

describe("uniqueSlug", () => {
  it("suffixes the slug until it is free", async () => {
    const tried: string[] = [];
    const slug = await uniqueSlug("My First Note", async (candidate) => {
      tried.push(candidate);
      return tried.length < 2;
    });

    expect(tried).toHaveLength(2);
    expect(slug).toBe(tried[1]);
    expect(slug).toMatch(/^my-first-note-[0-9a-f]{8}$/);
  });

  it("falls back to 'note' for titles without letters", async () => {
    expect(await uniqueSlug("???", async () => false)).toMatch(/^note-[0-9a-f]{8}$/);
  });
});
