import { beforeEach, describe, expect, it } from "vitest";
import { createAction, noteRef, userRef } from "../../src/services/action.service.js";
import { resetRepositories } from "../support/harness.js";
import type { MemoryRepositories } from "../support/memoryRepositories.js";

describe("createAction", () => {
  let repos: MemoryRepositories;

  beforeEach(() => {
    repos = resetRepositories();
  });

  it("records an action once within a minute", async () => {
    const first = await createAction(userRef("u1"), "likes", noteRef("n1"));
    const repeat = await createAction(userRef("u1"), "likes", noteRef("n1"));

    expect(first).toMatchObject({ verb: "likes", actor: { kind: "User", id: "u1" }, target: { kind: "Note", id: "n1" } });
    expect(repeat).toBeNull();
    expect(repos.actions.rows.size).toBe(1);
  });

  it("records actions on other targets", async () => {
    await createAction(userRef("u1"), "likes", noteRef("n1"));
    await createAction(userRef("u1"), "likes", noteRef("n2"));
    await createAction(userRef("u1"), "new");

    expect([...repos.actions.rows.values()].map((action) => action.target?.id ?? null)).toEqual(["n1", "n2", null]);
  });
});
