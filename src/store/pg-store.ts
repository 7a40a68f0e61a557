import { Queryable } from "../db";
import { findUserByEmail, findUserById, insertUser } from "../queries/users";
import {
  deletePost,
  fetchPosts,
  findPostById,
  findPostByTitle,
  insertPost,
  updatePost,
} from "../queries/posts";
import {
  deleteComment,
  fetchCommentsForPost,
  findCommentById,
  insertComment,
} from "../queries/comments";
import { BlogStore } from "./store";

export function createPgStore(db: Queryable): BlogStore {
  return {
    users: {
      findById: (id) => findUserById(db, id),
      findByEmail: (email) => findUserByEmail(db, email),
      create: (input) => insertUser(db, input),
    },
    posts: {
      list: () => fetchPosts(db),
      findById: (id) => findPostById(db, id),
      findByTitle: (title) => findPostByTitle(db, title),
      create: (input) => insertPost(db, input),
      update: (id, input) => updatePost(db, id, input),
      delete: (id) => deletePost(db, id),
    },
    comments: {
      listForPost: (postId) => fetchCommentsForPost(db, postId),
      findById: (id) => findCommentById(db, id),
      create: (input) => insertComment(db, input),
      delete: (id) => deleteComment(db, id),
    },
  };
}
