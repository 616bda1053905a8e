import bcrypt from "bcrypt";
import createError from "http-errors";
import { env } from "../config/env.js";
import { getRepositories } from "../repositories/index.js";
import { FieldError, FirstNameNotSetError } from "../utils/errors.js";
import { generateUsername } from "../utils/username.js";
import { createAction, userRef } from "./action.service.js";
import { sendSignupEmail } from "./mail.service.js";
import * as TokenService from "./token.service.js";
import { presentUser } from "./user.service.js";

export async function isEmailTaken(email: string) {
  return getRepositories().users.existsByEmail(email);
}

/**
 * Mail a signup link for `email`. Registered emails get nothing.
 */
export async function requestSignup(email: string, language: string): Promise<"sent" | "taken"> {
  if (await isEmailTaken(email)) return "taken";

  const token = await TokenService.signSignupToken(email);
  await sendSignupEmail(email, language, token);
  return "sent";
}

export const checkSignupToken = TokenService.verifySignupToken;

type SignupInput = { firstName: string; password1: string };

export async function completeSignup(token: string, input: SignupInput, meta: TokenService.TokenMeta) {
  const email = await TokenService.verifySignupToken(token);
  if (!email) throw createError(400, "Signup link is invalid or expired");

  const { users, signupTokens } = getRepositories();

  // 1. Check existence
  if (await users.existsByEmail(email)) throw createError(409, "Email already exists");

  const localPart = email.split("@")[0] ?? "";
  if (localPart.length >= 3 && input.password1.toLowerCase().includes(localPart)) {
    throw new FieldError("password1", "The password is too similar to the email address.");
  }

  // 2. Pick a username
  let username: string;
  try {
    username = await generateUsername({ firstName: input.firstName });
  } catch (err) {
    if (err instanceof FirstNameNotSetError) {
      throw new FieldError("firstName", "Full Name is required");
    }
    throw err;
  }

  // 3. Create User
  const passwordHash = await bcrypt.hash(input.password1, env.BCRYPT_ROUNDS);
  const user = await users.create({ email, username, firstName: input.firstName, passwordHash });

  await signupTokens.deleteByEmail(email);
  await createAction(userRef(user.id), "new");

  // 4. Auto-Login
  const session = await TokenService.signSessionToken(user.id, meta);

  return { user: presentUser(user), sessionToken: session.token, expiresAt: session.expiresAt };
}

export async function signin(email: string, pass: string, meta: TokenService.TokenMeta) {
  // 1. Find User
  const user = await getRepositories().users.findByEmail(email);
  if (!user) return { code: "noemail" as const };

  // 2. Verify Password
  const isValid = user.passwordHash !== null && await bcrypt.compare(pass, user.passwordHash);
  if (!isValid) return { code: "badpass" as const };

  // 3. Issue Session
  const session = await TokenService.signSessionToken(user.id, meta);
  return { code: "success" as const, sessionToken: session.token, expiresAt: session.expiresAt };
}

export async function signout(jti: string) {
  await TokenService.revokeSession(jti);
}
