import { beforeEach, describe, expect, it } from "vitest";
import { FirstNameNotSetError } from "../../src/utils/errors.js";
import { generateUsername, unslugify, userSlug } from "../../src/utils/username.js";
import { resetRepositories } from "../support/harness.js";
import type { MemoryRepositories } from "../support/memoryRepositories.js";

describe("generateUsername", () => {
  let repos: MemoryRepositories;

  beforeEach(() => {
    repos = resetRepositories();
  });

  it("joins the lower-cased name parts with dots", async () => {
    expect(await generateUsername({ firstName: "Some Name" })).toBe("@some.name");
    expect(await generateUsername({ firstName: "Ada", lastName: "Lovelace" })).toBe("@ada.lovelace");
  });

  it("appends a counter when the username is taken", async () => {
    await repos.users.create({ email: "a@example.com", username: "@some.name", firstName: "Some Name", passwordHash: null });
    expect(await generateUsername({ firstName: "Some Name" })).toBe("@some.name2");

    await repos.users.create({ email: "b@example.com", username: "@some.name2", firstName: "Some Name", passwordHash: null });
    expect(await generateUsername({ firstName: "Some Name" })).toBe("@some.name3");
  });

  it("skips slugs of fixed user routes", async () => {
    expect(await generateUsername({ firstName: "Signin" })).toBe("@signin2");
  });

  it("requires a first name", async () => {
    await expect(generateUsername({ firstName: "  " })).rejects.toBeInstanceOf(FirstNameNotSetError);
    await expect(generateUsername({})).rejects.toThrow("First name is not set");
    await expect(generateUsername({ firstName: "", lastName: "Lovelace" })).rejects.toBeInstanceOf(FirstNameNotSetError);
  });
});

describe("userSlug", () => {
  it("drops and restores the leading @", () => {
    expect(userSlug("@some.name")).toBe("some.name");
    expect(unslugify("some.name")).toBe("@some.name");
  });
});
