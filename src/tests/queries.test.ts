import { describe, expect, it, vi } from "vitest";
import { DatabaseError } from "pg";
import { ConflictError } from "../errors";
import { deleteComment, fetchCommentsForPost, insertComment } from "../queries/comments";
import { deletePost, fetchPosts, insertPost, updatePost } from "../queries/posts";
import { findUserByEmail, findUserById, insertUser } from "../queries/users";

const result = (rows: object[], rowCount = rows.length) => ({ rows, rowCount });

const uniqueViolation = () => {
  const error = new DatabaseError("duplicate key value violates unique constraint", 0, "error");
  error.code = "23505";
  return error;
};

const userRow = {
  id: 1,
  email: "a@x.com",
  password: "hashed",
  name: "Alice",
  role: "admin",
  created_at: new Date(2026, 0, 1),
};

const postRow = {
  id: 3,
  title: "Title",
  subtitle: "Sub",
  date: "October 05, 2026",
  body: "<p>Body</p>",
  img_url: "https://example.com/a.png",
  author_id: 1,
};

describe("user queries", () => {
  it("should map a user row", async () => {
    const db = { query: vi.fn().mockResolvedValue(result([userRow])) };

    expect(await findUserByEmail(db, "a@x.com")).toEqual({
      id: 1,
      email: "a@x.com",
      passwordHash: "hashed",
      name: "Alice",
      role: "admin",
      createdAt: new Date(2026, 0, 1),
    });
    expect(db.query).toHaveBeenCalledWith("SELECT * FROM users WHERE email = $1", [
      "a@x.com",
    ]);
  });

  it("should return null when no row matches", async () => {
    const db = { query: vi.fn().mockResolvedValue(result([])) };
    expect(await findUserById(db, 9)).toBeNull();
  });

  it("should refuse an unknown role", async () => {
    const db = { query: vi.fn().mockResolvedValue(result([{ ...userRow, role: "owner" }])) };
    await expect(findUserById(db, 1)).rejects.toThrow("Unknown user role: owner");
  });

  it("should translate a unique violation on insert", async () => {
    const db = { query: vi.fn().mockRejectedValue(uniqueViolation()) };

    await expect(
      insertUser(db, { email: "a@x.com", passwordHash: "hashed", name: "Alice" })
    ).rejects.toEqual(new ConflictError("email"));
  });

  it("should pass other errors through", async () => {
    const failure = new Error("connection reset");
    const db = { query: vi.fn().mockRejectedValue(failure) };

    await expect(
      insertUser(db, { email: "a@x.com", passwordHash: "hashed", name: "Alice" })
    ).rejects.toBe(failure);
  });
});

describe("post queries", () => {
  it("should map posts with their author name", async () => {
    const db = {
      query: vi.fn().mockResolvedValue(result([{ ...postRow, author_name: "Alice" }])),
    };

    expect(await fetchPosts(db)).toEqual([
      {
        id: 3,
        title: "Title",
        subtitle: "Sub",
        date: "October 05, 2026",
        body: "<p>Body</p>",
        imgUrl: "https://example.com/a.png",
        authorId: 1,
        authorName: "Alice",
      },
    ]);
    expect(db.query.mock.calls[0][0]).toContain("ORDER BY p.id");
  });

  it("should send insert parameters in column order", async () => {
    const db = { query: vi.fn().mockResolvedValue(result([postRow])) };

    await insertPost(db, {
      title: "Title",
      subtitle: "Sub",
      date: "October 05, 2026",
      body: "<p>Body</p>",
      imgUrl: "https://example.com/a.png",
      authorId: 1,
    });

    expect(db.query.mock.calls[0][1]).toEqual([
      "Title",
      "Sub",
      "October 05, 2026",
      "<p>Body</p>",
      "https://example.com/a.png",
      1,
    ]);
  });

  it("should translate a duplicate title on update", async () => {
    const db = { query: vi.fn().mockRejectedValue(uniqueViolation()) };

    await expect(
      updatePost(db, 3, {
        title: "Taken",
        subtitle: "Sub",
        body: "Body",
        imgUrl: "https://example.com/a.png",
        authorId: 1,
      })
    ).rejects.toMatchObject({ field: "title" });
  });

  it("should report whether a post was deleted", async () => {
    const db = {
      query: vi
        .fn()
        .mockResolvedValueOnce(result([], 1))
        .mockResolvedValueOnce(result([], 0)),
    };

    expect(await deletePost(db, 3)).toBe(true);
    expect(await deletePost(db, 3)).toBe(false);
  });
});

describe("comment queries", () => {
  it("should map comments with their author", async () => {
    const db = {
      query: vi.fn().mockResolvedValue(
        result([
          {
            id: 5,
            text: "hello",
            author_id: 2,
            post_id: 3,
            author_name: "Bob",
            author_email: "b@x.com",
          },
        ])
      ),
    };

    expect(await fetchCommentsForPost(db, 3)).toEqual([
      {
        id: 5,
        text: "hello",
        authorId: 2,
        postId: 3,
        authorName: "Bob",
        authorEmail: "b@x.com",
      },
    ]);
    expect(db.query.mock.calls[0][1]).toEqual([3]);
  });

  it("should insert and delete by id", async () => {
    const db = {
      query: vi
        .fn()
        .mockResolvedValueOnce(result([{ id: 6, text: "hi", author_id: 2, post_id: 3 }]))
        .mockResolvedValueOnce(result([], 1)),
    };

    expect(await insertComment(db, { text: "hi", authorId: 2, postId: 3 })).toEqual({
      id: 6,
      text: "hi",
      authorId: 2,
      postId: 3,
    });
    expect(await deleteComment(db, 6)).toBe(true);
    expect(db.query.mock.calls[1]).toEqual(["DELETE FROM comments WHERE id = $1", [6]]);
  });
});
