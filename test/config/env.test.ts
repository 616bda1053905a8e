import { describe, expect, it } from "vitest";
import { env, getExpiryDate } from "../../src/config/env.js";

describe("env", () => {
  it("reads the test configuration", () => {
    expect(env.NODE_ENV).toBe("test");
    expect(env.LANGUAGES).toEqual(["en", "ru"]);
    expect(env.DEFAULT_LANGUAGE).toBe("en");
    expect(env.SITE_URL).toBe("http://noted.test");
    expect(env.LOG_REQUESTS).toBe(false);
  });
});

describe("getExpiryDate", () => {
  const from = Date.UTC(2024, 0, 1);

  it("adds the duration to the start time", () => {
    expect(getExpiryDate("30s", from).getTime()).toBe(from + 30_000);
    expect(getExpiryDate("15m", from).getTime()).toBe(from + 15 * 60_000);
    expect(getExpiryDate("2h", from).getTime()).toBe(from + 2 * 3_600_000);
    expect(getExpiryDate("14d", from).toISOString()).toBe("2024-01-15T00:00:00.000Z");
  });

  it("rejects malformed durations", () => {
    expect(() => getExpiryDate("2 weeks", from)).toThrow("Invalid duration string");
  });
});
