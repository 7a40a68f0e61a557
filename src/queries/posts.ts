import { Queryable, isUniqueViolation } from "../db";
import { ConflictError } from "../errors";
import { NewPost, Post, PostUpdate, PostWithAuthor } from "../models/types";

interface PostRow {
  id: number;
  title: string;
  subtitle: string;
  date: string;
  body: string;
  img_url: string;
  author_id: number;
}

interface PostWithAuthorRow extends PostRow {
  author_name: string;
}

function toPost(row: PostRow): Post {
  return {
    id: row.id,
    title: row.title,
    subtitle: row.subtitle,
    date: row.date,
    body: row.body,
    imgUrl: row.img_url,
    authorId: row.author_id,
  };
}

function toPostWithAuthor(row: PostWithAuthorRow): PostWithAuthor {
  return { ...toPost(row), authorName: row.author_name };
}

const SELECT_POST_WITH_AUTHOR = `
  SELECT
    p.id,
    p.title,
    p.subtitle,
    p.date,
    p.body,
    p.img_url,
    p.author_id,
    u.name AS author_name
  FROM blog_posts p
  INNER JOIN users u ON p.author_id = u.id
`;

/**
 * 全投稿を著者名付きで取得（作成順）
 */
export async function fetchPosts(db: Queryable): Promise<PostWithAuthor[]> {
  const result = await db.query<PostWithAuthorRow>(
    `${SELECT_POST_WITH_AUTHOR} ORDER BY p.id`
  );
  return result.rows.map(toPostWithAuthor);
}

export async function findPostById(
  db: Queryable,
  id: number
): Promise<PostWithAuthor | null> {
  const result = await db.query<PostWithAuthorRow>(
    `${SELECT_POST_WITH_AUTHOR} WHERE p.id = $1`,
    [id]
  );
  return result.rows.length > 0 ? toPostWithAuthor(result.rows[0]) : null;
}

export async function findPostByTitle(
  db: Queryable,
  title: string
): Promise<Post | null> {
  const result = await db.query<PostRow>(
    "SELECT * FROM blog_posts WHERE title = $1",
    [title]
  );
  return result.rows.length > 0 ? toPost(result.rows[0]) : null;
}

export async function insertPost(db: Queryable, input: NewPost): Promise<Post> {
  try {
    const result = await db.query<PostRow>(
      `
      INSERT INTO blog_posts (title, subtitle, date, body, img_url, author_id)
      VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING *
    `,
      [
        input.title,
        input.subtitle,
        input.date,
        input.body,
        input.imgUrl,
        input.authorId,
      ]
    );
    return toPost(result.rows[0]);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConflictError("title");
    }
    throw error;
  }
}

export async function updatePost(
  db: Queryable,
  id: number,
  input: PostUpdate
): Promise<Post | null> {
  try {
    const result = await db.query<PostRow>(
      `
      UPDATE blog_posts
      SET title = $2, subtitle = $3, body = $4, img_url = $5, author_id = $6
      WHERE id = $1
      RETURNING *
    `,
      [id, input.title, input.subtitle, input.body, input.imgUrl, input.authorId]
    );
    return result.rows.length > 0 ? toPost(result.rows[0]) : null;
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConflictError("title");
    }
    throw error;
  }
}

/**
 * コメントは外部キーの ON DELETE CASCADE で同時に削除される
 */
export async function deletePost(db: Queryable, id: number): Promise<boolean> {
  const result = await db.query("DELETE FROM blog_posts WHERE id = $1", [id]);
  return (result.rowCount ?? 0) > 0;
}
