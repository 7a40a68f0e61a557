import {
  Comment,
  CommentWithAuthor,
  NewComment,
  NewPost,
  NewUser,
  Post,
  PostUpdate,
  PostWithAuthor,
  User,
} from "../models/types";

export interface UserRepository {
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /**
   * 最初に作成されたユーザーが管理者になる。
   * メールアドレスが重複していれば ConflictError("email")
   */
  create(input: NewUser): Promise<User>;
}

export interface PostRepository {
  list(): Promise<PostWithAuthor[]>;
  findById(id: number): Promise<PostWithAuthor | null>;
  findByTitle(title: string): Promise<Post | null>;
  /** タイトルが重複していれば ConflictError("title") */
  create(input: NewPost): Promise<Post>;
  update(id: number, input: PostUpdate): Promise<Post | null>;
  /** 投稿に付いたコメントも削除される */
  delete(id: number): Promise<boolean>;
}

export interface CommentRepository {
  listForPost(postId: number): Promise<CommentWithAuthor[]>;
  findById(id: number): Promise<Comment | null>;
  create(input: NewComment): Promise<Comment>;
  delete(id: number): Promise<boolean>;
}

export interface BlogStore {
  users: UserRepository;
  posts: PostRepository;
  comments: CommentRepository;
}
