import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { UserRecord } from "../../src/repositories/types.js";
import { Client, createNote, createUser, resetRepositories, signIn, startServer } from "../support/harness.js";
import type { MemoryRepositories } from "../support/memoryRepositories.js";

describe("site routes", () => {
  let server: Awaited<ReturnType<typeof startServer>>;
  let repos: MemoryRepositories;
  let author: UserRecord;
  let client: Client;

  beforeAll(async () => {
    server = await startServer();
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(async () => {
    repos = resetRepositories();
    author = await createUser(repos, { email: "author@example.com", username: "@author", firstName: "Author" });
    client = new Client(server.baseUrl);
  });

  it("reports health", async () => {
    expect(await client.json("/health")).toEqual({ status: 200, data: { message: "ok" } });
  });

  it("redirects the root to the default language", async () => {
    const res = await client.request("/");

    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toBe("/en/");
  });

  it("serves robots.txt", async () => {
    const res = await client.request("/robots.txt");

    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(await res.text()).toBe([
      "User-agent: *",
      "Disallow: /en/users/signup/",
      "Disallow: /en/me/",
      "Disallow: /en/feed/",
      "Disallow: /ru/users/signup/",
      "Disallow: /ru/me/",
      "Disallow: /ru/feed/",
      "",
      "Sitemap: http://noted.test/sitemap.xml",
      "",
    ].join("\n"));
  });

  it("lists public notes and sources in the sitemap", async () => {
    const note = await createNote(repos, author, { slug: "public-note", title: "Public" });
    await createNote(repos, author, { slug: "hidden-draft", title: "Hidden", draft: true });
    await repos.sources.create({ title: "Deep Work", slug: "deep-work", type: "book", link: "", description: "" });

    const res = await client.request("/sitemap.xml");
    expect(res.headers.get("content-type")).toBe("application/xml; charset=utf-8");
    expect(await res.text()).toBe([
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
      "  <url>",
      "    <loc>http://noted.test/en/notes/public-note/</loc>",
      `    <lastmod>${note.updatedAt.toISOString().slice(0, 10)}</lastmod>`,
      "  </url>",
      "  <url>",
      "    <loc>http://noted.test/en/sources/deep-work/</loc>",
      "  </url>",
      "</urlset>",
      "",
    ].join("\n"));
  });

  it("serves the message catalog of the language", async () => {
    const res = await client.json("/ru/jsi18n/");

    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ locale: "ru", messages: { "Sign in": "Войти" } });
  });

  describe("tags", () => {
    beforeEach(async () => {
      await createNote(repos, author, { slug: "one", title: "One", tags: ["ideas", "books"] });
      await createNote(repos, author, { slug: "two", title: "Two", tags: ["ideas"] });
      await createNote(repos, author, { slug: "three", title: "Three", tags: ["drafts-only"], draft: true });
    });

    it("counts tags of public notes", async () => {
      const res = await client.json("/en/tags/");

      expect(res.data).toEqual({
        success: true,
        data: [{ name: "ideas", count: 2 }, { name: "books", count: 1 }],
      });
    });

    it("lists the notes of a tag", async () => {
      const res = await client.json("/en/tags/Ideas/");

      expect(res.data).toMatchObject({
        data: { tag: "ideas", followed: false, notes: [{ slug: "two" }, { slug: "one" }] },
      });
    });

    it("answers tags without public notes with 404", async () => {
      expect((await client.request("/en/tags/unknown/")).status).toBe(404);
      expect((await client.request("/en/tags/drafts-only/")).status).toBe(404);
    });

    it("toggles tag subscriptions", async () => {
      await signIn(client, "author@example.com");

      expect((await client.json("/en/tags/ideas/follow/")).data).toEqual({ followed: true });
      expect((await client.json("/en/tags/ideas/")).data).toMatchObject({ data: { followed: true } });
      expect((await client.json("/en/me/")).data).toMatchObject({ data: { user: { tags: ["ideas"] } } });
      expect((await client.json("/en/tags/ideas/follow/")).data).toEqual({ followed: false });
    });
  });
});
