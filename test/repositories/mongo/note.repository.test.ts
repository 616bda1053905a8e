import { describe, expect, it } from "vitest";
import { listPipeline, toMatch, topTagsPipeline } from "../../../src/repositories/mongo/note.repository.js";

const USER_ID = "64b7f0c2a1b2c3d4e5f60718";

// ObjectIds serialize to their hex string
const plain = (value: unknown): unknown => JSON.parse(JSON.stringify(value));

describe("toMatch", () => {
  it("casts ids to ObjectIds", () => {
    expect(plain(toMatch({ authorId: USER_ID, bookmarkedBy: USER_ID, draft: false }))).toEqual({
      author: USER_ID,
      bookmarks: USER_ID,
      draft: false,
    });
  });

  it("requires both a tag and one of the subscribed tags", () => {
    expect(toMatch({ tag: "ideas", tagsIn: ["ideas", "books"] })).toEqual({
      $and: [{ tags: "ideas" }, { tags: { $in: ["ideas", "books"] } }],
    });
    expect(toMatch({ tagsIn: ["books"] })).toEqual({ tags: { $in: ["books"] } });
  });

  it("lets a user see published notes and their own drafts", () => {
    expect(plain(toMatch({ visibleTo: USER_ID }))).toEqual({
      $or: [{ draft: false }, { author: USER_ID }],
    });
  });
});

describe("listPipeline", () => {
  it("orders by creation date by default", () => {
    expect(listPipeline({})).toEqual([
      { $match: {} },
      { $sort: { createdAt: -1, _id: -1 } },
    ]);
  });

  it("counts likes before sorting by them", () => {
    expect(listPipeline({ draft: false }, { order: "likes", skip: 100, limit: 100 })).toEqual([
      { $match: { draft: false } },
      { $addFields: { likesCount: { $size: "$likes" } } },
      { $sort: { likesCount: -1, createdAt: -1, _id: -1 } },
      { $skip: 100 },
      { $limit: 100 },
    ]);
  });

  it("sorts by views without a skip on the first page", () => {
    expect(listPipeline({ draft: false }, { order: "views", skip: 0, limit: 10 })).toEqual([
      { $match: { draft: false } },
      { $sort: { views: -1, createdAt: -1, _id: -1 } },
      { $limit: 10 },
    ]);
  });
});

describe("topTagsPipeline", () => {
  it("groups the tags of published notes", () => {
    expect(topTagsPipeline(7)).toEqual([
      { $match: { draft: false } },
      { $unwind: "$tags" },
      { $group: { _id: "$tags", count: { $sum: 1 } } },
      { $sort: { count: -1, _id: 1 } },
      { $limit: 7 },
    ]);
  });
});
