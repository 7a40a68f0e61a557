import { z } from "zod";
import { ConfigError } from "./errors";

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1).optional(),
  SECRET_KEY: z.string({ required_error: "SECRET_KEY is required" }).min(1),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  SLOW_QUERY_MS: z.coerce.number().int().nonnegative().default(200),
  SESSION_COOKIE_SECURE: booleanFlag,
});

export interface AppConfig {
  port: number;
  databaseUrl: string | undefined;
  secretKey: string;
  bcryptRounds: number;
  slowQueryMs: number;
  secureCookies: boolean;
}

/**
 * 環境変数から設定を読み込む（空文字は未設定として扱う）
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const result = ConfigSchema.safeParse(present);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    secretKey: parsed.SECRET_KEY,
    bcryptRounds: parsed.BCRYPT_ROUNDS,
    slowQueryMs: parsed.SLOW_QUERY_MS,
    secureCookies: parsed.SESSION_COOKIE_SECURE,
  };
}
