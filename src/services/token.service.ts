import jwt from "jsonwebtoken";
import { v4 as uuidv4 } from "uuid";
import { env, getExpiryDate } from "../config/env.js";
import { getRepositories } from "../repositories/index.js";

// Types
type SessionPayload = { sub: string; jti: string }; // 'sub' is the User ID, 'jti' the Session
type SignupPayload = { sub: string; jti: string }; // 'sub' is the email being verified
export type TokenMeta = { ip: string; deviceInfo: string };

const isSessionPayload = (value: unknown): value is SessionPayload =>
  typeof value === "object" && value !== null
  && "sub" in value && typeof value.sub === "string"
  && "jti" in value && typeof value.jti === "string";

const isSignupPayload = (value: unknown): value is SignupPayload => isSessionPayload(value);

/**
 * Issue a session token (Stateful)
 * Creates a Session record and returns the signed JWT.
 */
export const signSessionToken = async (userId: string, meta: TokenMeta) => {
  const jti = uuidv4();
  const expiresAt = getExpiryDate(env.SESSION_EXPIRES_IN);

  await getRepositories().sessions.create({
    userId,
    jti,
    expiresAt,
    ip: meta.ip || null,
    deviceInfo: meta.deviceInfo,
  });

  const token = jwt.sign(
    { sub: userId, jti } satisfies SessionPayload,
    env.JWT_SECRET,
    { expiresIn: env.SESSION_EXPIRES_IN }
  );

  return { token, jti, expiresAt };
};

/**
 * Verify a session token and decode it
 */
export const verifySessionToken = (token: string): SessionPayload => {
  const payload = jwt.verify(token, env.JWT_SECRET);
  if (!isSessionPayload(payload)) throw new jwt.JsonWebTokenError("Malformed session token");
  return payload;
};

/**
 * Resolve a session token to its user id, or null when the session is gone.
 */
export const resolveSession = async (token: string): Promise<{ userId: string; jti: string } | null> => {
  let payload: SessionPayload;
  try {
    payload = verifySessionToken(token);
  } catch {
    return null;
  }

  const session = await getRepositories().sessions.findByJti(payload.jti);
  if (!session || session.revoked || session.userId !== payload.sub) return null;
  if (session.expiresAt.getTime() <= Date.now()) return null;

  return { userId: session.userId, jti: session.jti };
};

/**
 * Revoke a specific session (Signout)
 */
export const revokeSession = async (jti: string) => {
  await getRepositories().sessions.revoke(jti);
};

/**
 * Issue a signup token for an email and remember it until the signup completes.
 */
export const signSignupToken = async (email: string) => {
  const token = jwt.sign(
    { sub: email, jti: uuidv4() } satisfies SignupPayload,
    env.SIGNUP_TOKEN_SECRET,
    { expiresIn: env.SIGNUP_TOKEN_EXPIRES_IN }
  );
  await getRepositories().signupTokens.create(token, email);
  return token;
};

/**
 * The email a signup token was issued for, or null when the token is unknown,
 * tampered with or expired.
 */
export const verifySignupToken = async (token: string): Promise<string | null> => {
  const record = await getRepositories().signupTokens.findByToken(token);
  if (!record) return null;

  try {
    const payload = jwt.verify(token, env.SIGNUP_TOKEN_SECRET);
    if (!isSignupPayload(payload) || payload.sub !== record.email) return null;
    return payload.sub;
  } catch {
    return null;
  }
};
