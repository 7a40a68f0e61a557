import { Queryable } from "../db";
import { Comment, CommentWithAuthor, NewComment } from "../models/types";

interface CommentRow {
  id: number;
  text: string;
  author_id: number;
  post_id: number;
}

interface CommentWithAuthorRow extends CommentRow {
  author_name: string;
  author_email: string;
}

function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    text: row.text,
    authorId: row.author_id,
    postId: row.post_id,
  };
}

export async function fetchCommentsForPost(
  db: Queryable,
  postId: number
): Promise<CommentWithAuthor[]> {
  const result = await db.query<CommentWithAuthorRow>(
    `
    SELECT
      c.id,
      c.text,
      c.author_id,
      c.post_id,
      u.name AS author_name,
      u.email AS author_email
    FROM comments c
    INNER JOIN users u ON c.author_id = u.id
    WHERE c.post_id = $1
    ORDER BY c.id
  `,
    [postId]
  );

  return result.rows.map((row) => ({
    ...toComment(row),
    authorName: row.author_name,
    authorEmail: row.author_email,
  }));
}

export async function findCommentById(
  db: Queryable,
  id: number
): Promise<Comment | null> {
  const result = await db.query<CommentRow>(
    "SELECT id, text, author_id, post_id FROM comments WHERE id = $1",
    [id]
  );
  return result.rows.length > 0 ? toComment(result.rows[0]) : null;
}

export async function insertComment(
  db: Queryable,
  input: NewComment
): Promise<Comment> {
  const result = await db.query<CommentRow>(
    `
    INSERT INTO comments (text, author_id, post_id)
    VALUES ($1, $2, $3)
    RETURNING id, text, author_id, post_id
  `,
    [input.text, input.authorId, input.postId]
  );
  return toComment(result.rows[0]);
}

export async function deleteComment(db: Queryable, id: number): Promise<boolean> {
  const result = await db.query("DELETE FROM comments WHERE id = $1", [id]);
  return (result.rowCount ?? 0) > 0;
}
