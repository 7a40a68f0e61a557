import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  TestClient,
  TestServer,
  postFields,
  register,
  startTestServer,
} from "./helpers/test-server";

const admin = { email: "admin@example.com", password: "admin-pass", name: "Admin" };
const alice = { email: "a@x.com", password: "alice-pass", name: "Alice" };
const bob = { email: "b@x.com", password: "bob-pass", name: "Bob" };

describe("Comments", () => {
  let server: TestServer;
  let aliceClient: TestClient;
  let bobClient: TestClient;

  beforeEach(async () => {
    server = await startTestServer();
    const adminClient = server.client();
    aliceClient = server.client();
    bobClient = server.client();
    await register(adminClient, admin);
    await register(aliceClient, alice);
    await register(bobClient, bob);
    await adminClient.post("/new-post", postFields());
  });

  afterEach(async () => {
    await server.stop();
  });

  describe("add", () => {
    it("should show a new comment under the post with its author", async () => {
      const response = await aliceClient.post("/post/1", { comment: "hello" });

      expect(response.status).toBe(302);
      expect(response.headers.get("location")).toBe("/post/1");

      const page = await (await aliceClient.get("/post/1")).json();
      expect(page).toMatchObject({
        view: "post",
        comments: [
          {
            id: 1,
            text: "hello",
            authorId: 2,
            postId: 1,
            authorName: "Alice",
            authorEmail: "a@x.com",
          },
        ],
      });
    });

    it("should send anonymous commenters to login without creating a comment", async () => {
      const client = server.client();

      const response = await client.post("/post/1", { comment: "hello" });
      expect(response.status).toBe(302);
      expect(response.headers.get("location")).toBe("/login");
      expect(await server.store.comments.listForPost(1)).toEqual([]);

      const page = await (await client.get("/login")).json();
      expect(page).toMatchObject({
        messages: ["You must login or register to comment."],
      });
    });

    it("should re-render the post when the comment is empty", async () => {
      const response = await aliceClient.post("/post/1", { comment: "" });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        view: "post",
        post: { id: 1 },
        comments: [],
        form: { errors: { comment: "This field is required." } },
      });
    });

    it("should answer not found when the post does not exist", async () => {
      const response = await aliceClient.post("/post/5", { comment: "hello" });
      expect(response.status).toBe(404);
    });
  });

  describe("delete", () => {
    beforeEach(async () => {
      await aliceClient.post("/post/1", { comment: "alice one" });
      await bobClient.post("/post/1", { comment: "bob one" });
      await aliceClient.post("/post/1", { comment: "alice two" });
    });

    it("should let the author delete exactly that comment", async () => {
      const response = await aliceClient.get("/delete_comment/3/1");

      expect(response.status).toBe(302);
      expect(response.headers.get("location")).toBe("/post/1");

      const remaining = await server.store.comments.listForPost(1);
      expect(remaining.map((comment) => comment.text)).toEqual([
        "alice one",
        "bob one",
      ]);
    });

    it("should forbid other users even if they have comments of their own", async () => {
      const response = await bobClient.get("/delete_comment/1/1");

      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({ error: "Forbidden" });
      expect(await server.store.comments.listForPost(1)).toHaveLength(3);
    });

    it("should forbid anonymous visitors", async () => {
      const response = await server.client().get("/delete_comment/2/1");

      expect(response.status).toBe(403);
      expect(await server.store.comments.listForPost(1)).toHaveLength(3);
    });

    it("should answer forbidden for a missing comment", async () => {
      const response = await aliceClient.get("/delete_comment/9/1");
      expect(response.status).toBe(403);
      expect(await response.json()).toEqual({ error: "Forbidden" });
    });

    it("should redirect to the comment's own post", async () => {
      const response = await bobClient.get("/delete_comment/2/77");
      expect(response.headers.get("location")).toBe("/post/1");
    });
  });
});
