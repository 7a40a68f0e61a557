import { ConflictError } from "../errors";
import {
  Comment,
  CommentWithAuthor,
  Post,
  PostWithAuthor,
  User,
} from "../models/types";
import { BlogStore } from "./store";

/**
 * プロセス内メモリに保持するストア。DATABASE_URL 未設定時とテストで使う。
 * Map の挿入順がそのまま id 順になる
 */
export function makeMemoryStore(): BlogStore {
  const users = new Map<number, User>();
  const posts = new Map<number, Post>();
  const comments = new Map<number, Comment>();
  const sequences = { users: 0, posts: 0, comments: 0 };

  const authorOf = (authorId: number): User => {
    const user = users.get(authorId);
    if (!user) {
      throw new Error(`User ${authorId} does not exist`);
    }
    return user;
  };

  const withAuthor = (post: Post): PostWithAuthor => ({
    ...post,
    authorName: authorOf(post.authorId).name,
  });

  const assertTitleFree = (title: string, exceptId?: number): void => {
    for (const post of posts.values()) {
      if (post.title === title && post.id !== exceptId) {
        throw new ConflictError("title");
      }
    }
  };

  return {
    users: {
      findById: async (id) => {
        const user = users.get(id);
        return user ? { ...user } : null;
      },

      findByEmail: async (email) => {
        const user = [...users.values()].find((u) => u.email === email);
        return user ? { ...user } : null;
      },

      create: async (input) => {
        if ([...users.values()].some((user) => user.email === input.email)) {
          throw new ConflictError("email");
        }
        const hasAdmin = [...users.values()].some(
          (user) => user.role === "admin"
        );
        const user: User = {
          id: ++sequences.users,
          email: input.email,
          passwordHash: input.passwordHash,
          name: input.name,
          role: hasAdmin ? "member" : "admin",
          createdAt: new Date(),
        };
        users.set(user.id, user);
        return { ...user };
      },
    },

    posts: {
      list: async () => [...posts.values()].map(withAuthor),

      findById: async (id) => {
        const post = posts.get(id);
        return post ? withAuthor(post) : null;
      },

      findByTitle: async (title) => {
        const post = [...posts.values()].find((p) => p.title === title);
        return post ? { ...post } : null;
      },

      create: async (input) => {
        authorOf(input.authorId);
        assertTitleFree(input.title);
        const post: Post = { id: ++sequences.posts, ...input };
        posts.set(post.id, post);
        return { ...post };
      },

      update: async (id, input) => {
        const existing = posts.get(id);
        if (!existing) {
          return null;
        }
        authorOf(input.authorId);
        assertTitleFree(input.title, id);
        const updated: Post = { ...existing, ...input, id };
        posts.set(id, updated);
        return { ...updated };
      },

      delete: async (id) => {
        if (!posts.delete(id)) {
          return false;
        }
        for (const comment of [...comments.values()]) {
          if (comment.postId === id) {
            comments.delete(comment.id);
          }
        }
        return true;
      },
    },

    comments: {
      listForPost: async (postId) =>
        [...comments.values()]
          .filter((comment) => comment.postId === postId)
          .map((comment): CommentWithAuthor => {
            const author = authorOf(comment.authorId);
            return {
              ...comment,
              authorName: author.name,
              authorEmail: author.email,
            };
          }),

      findById: async (id) => {
        const comment = comments.get(id);
        return comment ? { ...comment } : null;
      },

      create: async (input) => {
        authorOf(input.authorId);
        if (!posts.has(input.postId)) {
          throw new Error(`Post ${input.postId} does not exist`);
        }
        const comment: Comment = { id: ++sequences.comments, ...input };
        comments.set(comment.id, comment);
        return { ...comment };
      },

      delete: async (id) => comments.delete(id),
    },
  };
}
