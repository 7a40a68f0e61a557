import { DatabaseError, Pool, QueryResult, QueryResultRow } from "pg";
import * as fs from "fs";
import * as path from "path";
import { QueryMonitor, truncateSql } from "./utils/performance";

/**
 * クエリ関数だけを必要とする箇所（queries/*）が依存するインターフェース
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<R>>;
}

export interface Database extends Queryable {
  testConnection(): Promise<boolean>;
  ensureSchema(): Promise<void>;
  end(): Promise<void>;
}

export interface DatabaseOptions {
  connectionString: string;
  monitor?: QueryMonitor;
}

const SCHEMA_PATH = path.join(__dirname, "../sql_scripts/01_create_schema.sql");

export function createDatabase(options: DatabaseOptions): Database {
  const pool = new Pool({
    connectionString: options.connectionString,
  });
  const monitor = options.monitor;

  pool.on("error", (err) => {
    console.error("Unexpected error on idle client", err);
  });

  const query = async <R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<R>> => {
    const start = Date.now();
    const res = await pool.query<R>(text, params);
    const duration = Date.now() - start;

    // しきい値を超えたクエリのみ警告を出す
    if (monitor && monitor.recordQuery(duration)) {
      console.warn(`Slow query (${duration}ms): ${truncateSql(text)}`);
    }

    return res;
  };

  return {
    query,

    testConnection: async () => {
      try {
        const result = await pool.query<{ now: Date }>("SELECT NOW() AS now");
        console.log("Database connection test successful:", result.rows[0]);
        return true;
      } catch (error) {
        console.error("Database connection test failed:", error);
        return false;
      }
    },

    ensureSchema: async () => {
      const schemaSQL = fs.readFileSync(SCHEMA_PATH, "utf8");
      await query(schemaSQL);
    },

    end: () => pool.end(),
  };
}

export function isUniqueViolation(error: unknown): boolean {
  return error instanceof DatabaseError && error.code === "23505";
}
