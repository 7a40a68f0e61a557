import { Queryable, isUniqueViolation } from "../db";
import { ConflictError } from "../errors";
import { NewUser, Role, User } from "../models/types";

interface UserRow {
  id: number;
  email: string;
  password: string;
  name: string;
  role: string;
  created_at: Date;
}

function toRole(value: string): Role {
  if (value === "admin" || value === "member") {
    return value;
  }
  throw new Error(`Unknown user role: ${value}`);
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password,
    name: row.name,
    role: toRole(row.role),
    createdAt: row.created_at,
  };
}

export async function findUserById(
  db: Queryable,
  id: number
): Promise<User | null> {
  const result = await db.query<UserRow>("SELECT * FROM users WHERE id = $1", [
    id,
  ]);
  return result.rows.length > 0 ? toUser(result.rows[0]) : null;
}

export async function findUserByEmail(
  db: Queryable,
  email: string
): Promise<User | null> {
  const result = await db.query<UserRow>(
    "SELECT * FROM users WHERE email = $1",
    [email]
  );
  return result.rows.length > 0 ? toUser(result.rows[0]) : null;
}

/**
 * ユーザーを作成する。管理者がまだ存在しなければ管理者として登録する
 */
export async function insertUser(db: Queryable, input: NewUser): Promise<User> {
  try {
    const result = await db.query<UserRow>(
      `
      INSERT INTO users (email, password, name, role)
      VALUES (
        $1, $2, $3,
        CASE WHEN EXISTS (SELECT 1 FROM users WHERE role = 'admin')
          THEN 'member' ELSE 'admin' END
      )
      RETURNING *
    `,
      [input.email, input.passwordHash, input.name]
    );
    return toUser(result.rows[0]);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new ConflictError("email");
    }
    throw error;
  }
}
