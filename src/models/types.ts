export type Role = "admin" | "member";

export interface User {
  id: number;
  email: string;
  passwordHash: string;
  name: string;
  role: Role;
  createdAt: Date;
}

export type PublicUser = Omit<User, "passwordHash">;

export interface Post {
  id: number;
  title: string;
  subtitle: string;
  date: string;
  body: string;
  imgUrl: string;
  authorId: number;
}

export interface PostWithAuthor extends Post {
  authorName: string;
}

export interface Comment {
  id: number;
  text: string;
  authorId: number;
  postId: number;
}

export interface CommentWithAuthor extends Comment {
  authorName: string;
  authorEmail: string;
}

export interface NewUser {
  email: string;
  passwordHash: string;
  name: string;
}

export interface NewPost {
  title: string;
  subtitle: string;
  date: string;
  body: string;
  imgUrl: string;
  authorId: number;
}

export type PostUpdate = Omit<NewPost, "date">;

export interface NewComment {
  text: string;
  authorId: number;
  postId: number;
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}
