import jwt from "jsonwebtoken";
import { beforeEach, describe, expect, it } from "vitest";
import {
  resolveSession,
  revokeSession,
  signSessionToken,
  signSignupToken,
  verifySignupToken,
} from "../../src/services/token.service.js";
import { resetRepositories } from "../support/harness.js";
import type { MemoryRepositories } from "../support/memoryRepositories.js";

const meta = { ip: "127.0.0.1", deviceInfo: "vitest" };

describe("session tokens", () => {
  let repos: MemoryRepositories;

  beforeEach(() => {
    repos = resetRepositories();
  });

  it("resolves a fresh session to its user", async () => {
    const { token, jti } = await signSessionToken("user-1", meta);

    expect(await resolveSession(token)).toEqual({ userId: "user-1", jti });
    expect(await repos.sessions.findByJti(jti)).toMatchObject({ userId: "user-1", ip: "127.0.0.1", revoked: false });
  });

  it("forgets revoked sessions", async () => {
    const { token, jti } = await signSessionToken("user-1", meta);
    await revokeSession(jti);

    expect(await resolveSession(token)).toBeNull();
  });

  it("rejects tokens signed with another secret", async () => {
    const { jti } = await signSessionToken("user-1", meta);
    const forged = jwt.sign({ sub: "user-1", jti }, "another-secret-value");

    expect(await resolveSession(forged)).toBeNull();
  });

  it("rejects tokens whose session belongs to somebody else", async () => {
    const { jti } = await signSessionToken("user-1", meta);
    const token = jwt.sign({ sub: "user-2", jti }, "test-secret-test-secret");

    expect(await resolveSession(token)).toBeNull();
  });
});

describe("signup tokens", () => {
  let repos: MemoryRepositories;

  beforeEach(() => {
    repos = resetRepositories();
  });

  it("verifies a stored token to its email", async () => {
    const token = await signSignupToken("new@example.com");

    expect(await verifySignupToken(token)).toBe("new@example.com");
    expect(repos.signupTokens.rows.size).toBe(1);
  });

  it("issues distinct tokens for the same email", async () => {
    const first = await signSignupToken("new@example.com");
    const second = await signSignupToken("new@example.com");

    expect(first).not.toBe(second);
  });

  it("rejects tokens it never stored", async () => {
    const token = jwt.sign({ sub: "new@example.com", jti: "x" }, "test-signup-secret-value");

    expect(await verifySignupToken(token)).toBeNull();
  });

  it("rejects tokens once the email signed up", async () => {
    const token = await signSignupToken("new@example.com");
    await repos.signupTokens.deleteByEmail("new@example.com");

    expect(await verifySignupToken(token)).toBeNull();
  });
});
