import type { Server } from "node:http";
import bcrypt from "bcrypt";
import { app } from "../../src/app.js";
import { initRepositories } from "../../src/repositories/index.js";
import type { NewNote, NoteRecord, UserRecord } from "../../src/repositories/types.js";
import { clearQueryCaches } from "../../src/utils/cache.js";
import { createMemoryRepositories, type MemoryRepositories } from "./memoryRepositories.js";

export const PASSWORD = "correct-horse-42";

/**
 * Fresh in-memory repositories for every test; query caches are dropped with them.
 */
export const resetRepositories = (): MemoryRepositories => {
  clearQueryCaches();
  const repos = createMemoryRepositories();
  initRepositories(repos);
  return repos;
};

export const startServer = async () => {
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Server has no port");

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () => new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    }),
  };
};

type RequestOptions = {
  method?: string;
  json?: unknown;
  form?: Record<string, string>;
  ajax?: boolean;
};

/**
 * fetch with a cookie jar. Redirects are returned, never followed.
 */
export class Client {
  private cookies = new Map<string, string>();

  constructor(private readonly baseUrl: string) {}

  get cookie(): string | undefined {
    return this.cookies.get("session");
  }

  async request(path: string, options: RequestOptions = {}) {
    const headers: Record<string, string> = {};
    if (options.ajax ?? true) headers["X-Requested-With"] = "XMLHttpRequest";
    if (this.cookies.size > 0) {
      headers.Cookie = [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
    }

    let body: string | undefined;
    if (options.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.json);
    } else if (options.form) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      body = new URLSearchParams(options.form).toString();
    }

    const res = await fetch(`${this.baseUrl}${path}`, {
      method: options.method ?? (body === undefined ? "GET" : "POST"),
      headers,
      body,
      redirect: "manual",
    });
    this.storeCookies(res.headers.getSetCookie());
    return res;
  }

  async json(path: string, options: RequestOptions = {}) {
    const res = await this.request(path, options);
    const data: unknown = await res.json();
    return { status: res.status, data };
  }

  private storeCookies(setCookies: string[]) {
    for (const header of setCookies) {
      const [pair = "", ...attributes] = header.split(";");
      const eq = pair.indexOf("=");
      const name = pair.slice(0, eq).trim();
      const value = pair.slice(eq + 1).trim();
      const expired = attributes.some((attr) => /^\s*expires=Thu, 01 Jan 1970/i.test(attr));

      if (!value || expired) this.cookies.delete(name);
      else this.cookies.set(name, value);
    }
  }
}

type UserSeed = { email: string; username: string; firstName: string; lastName?: string };

export const createUser = async (repos: MemoryRepositories, seed: UserSeed): Promise<UserRecord> =>
  repos.users.create({ ...seed, passwordHash: await bcrypt.hash(PASSWORD, 4) });

export const signIn = async (client: Client, email: string) => {
  const res = await client.json("/en/users/signin/", { json: { email, password: PASSWORD } });
  if (res.status !== 200) throw new Error(`Signin failed with ${res.status}`);
  return res;
};

export const createNote = (
  repos: MemoryRepositories,
  author: UserRecord,
  data: Partial<NewNote> & Pick<NewNote, "slug" | "title">
): Promise<NoteRecord> =>
  repos.notes.create({
    authorId: author.id,
    body: `${data.title} body`,
    draft: false,
    anonymous: false,
    parentId: null,
    sourceId: null,
    tags: [],
    ...data,
  });
