import { describe, expect, it } from "vitest";
import { PostCollection } from "../src/collection/post-collection";
import { PostNotFoundError, PostValidationError } from "../src/errors";
import { makePost } from "./fixtures/posts";

describe("PostCollection", () => {
  const posts = [
    makePost("binding", "2021-03-05", { tags: ["ASP.NET Core", "C#"] }),
    makePost("draft", "2022-01-10", { draft: true, tags: ["dotnet"] }),
    makePost("newer", "2023-06-01", { tags: ["c#", "Testing"] }),
    makePost("guides", "2020-01-01"),
  ];

  it("should list published posts newest first", () => {
    const collection = new PostCollection(posts);

    expect(collection.list().map((post) => post.slug)).toEqual([
      "newer",
      "binding",
      "guides",
    ]);
    expect(collection.size).toBe(3);
  });

  it("should include drafts when asked", () => {
    const collection = new PostCollection(posts, { includeDrafts: true });

    expect(collection.list().map((post) => post.slug)).toEqual([
      "newer",
      "draft",
      "binding",
      "guides",
    ]);
  });

  it("should break date ties by slug", () => {
    const collection = new PostCollection([
      makePost("b", "2024-01-01"),
      makePost("a", "2024-01-01"),
      makePost("c", "2024-01-01T12:00:00.000Z"),
    ]);

    expect(collection.list().map((post) => post.slug)).toEqual(["c", "a", "b"]);
  });

  it("should hide drafts from lookups", () => {
    const collection = new PostCollection(posts);

    expect(collection.get("binding")?.slug).toBe("binding");
    expect(collection.get("draft")).toBeUndefined();
    expect(() => collection.require("draft")).toThrow(PostNotFoundError);
  });

  it("should return older and newer neighbours", () => {
    const collection = new PostCollection(posts);

    const middle = collection.adjacent("binding");
    expect(middle.prev?.slug).toBe("guides");
    expect(middle.next?.slug).toBe("newer");

    const newest = collection.adjacent("newer");
    expect(newest.prev?.slug).toBe("binding");
    expect(newest.next).toBeNull();

    expect(() => collection.adjacent("missing")).toThrow(PostNotFoundError);
  });

  it("should count tags by slug", () => {
    const collection = new PostCollection(posts);

    expect(collection.tagCounts()).toEqual([
      { slug: "c", label: "c#", count: 2 },
      { slug: "aspnet-core", label: "ASP.NET Core", count: 1 },
      { slug: "testing", label: "Testing", count: 1 },
    ]);
  });

  it("should count a tag once per post", () => {
    const collection = new PostCollection([
      makePost("twice", "2024-01-01", { tags: ["C#", "c#"] }),
    ]);

    expect(collection.tagCounts()).toEqual([
      { slug: "c", label: "C#", count: 1 },
    ]);
  });

  it("should filter by tag label or slug", () => {
    const collection = new PostCollection(posts);

    expect(collection.byTag("C#").map((post) => post.slug)).toEqual([
      "newer",
      "binding",
    ]);
    expect(collection.byTag("aspnet-core").map((post) => post.slug)).toEqual([
      "binding",
    ]);
    expect(collection.byTag("dotnet")).toEqual([]);
  });

  it("should paginate the visible list", () => {
    const collection = new PostCollection(posts);

    const second = collection.page(2, 2);
    expect(second.items.map((post) => post.slug)).toEqual(["guides"]);
    expect(second.pagination).toEqual({
      currentPage: 2,
      totalPages: 2,
      totalItems: 3,
      pageSize: 2,
      hasNextPage: false,
      hasPrevPage: true,
    });
  });

  it("should reject duplicate slugs", () => {
    expect(
      () =>
        new PostCollection([
          makePost("same", "2024-01-01"),
          makePost("same", "2024-02-01"),
        ]),
    ).toThrow(PostValidationError);
  });
});
