import { getRepositories } from "../repositories/index.js";
import { FirstNameNotSetError } from "./errors.js";

// Slugs that would be shadowed by fixed routes under /users/.
const RESERVED_SLUGS = new Set(["signin", "signout", "signup", "signup-request", "validate-email"]);

/** "@some.name" -> "some.name" */
export const userSlug = (username: string) => username.replace(/^@/, "");

/** "some.name" -> "@some.name" */
export const unslugify = (slug: string) => `@${slug}`;

type NamedUser = { firstName?: string | null; lastName?: string | null };

/**
 * Builds "@first.middle.last" from the user's name, appending 2, 3, ... until
 * the username is free.
 */
export async function generateUsername(user: NamedUser): Promise<string> {
  const firstName = (user.firstName ?? "").trim();
  if (!firstName) throw new FirstNameNotSetError();

  const fullName = [firstName, (user.lastName ?? "").trim()].filter(Boolean).join(" ");

  const base = `@${fullName.toLowerCase().split(/\s+/).join(".")}`;
  const { users } = getRepositories();
  const isTaken = async (username: string) =>
    RESERVED_SLUGS.has(userSlug(username)) || users.existsByUsername(username);

  if (!(await isTaken(base))) return base;

  for (let suffix = 2; ; suffix++) {
    const candidate = `${base}${suffix}`;
    if (!(await isTaken(candidate))) return candidate;
  }
}
