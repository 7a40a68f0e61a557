/**
 * リクエスト単位で HTTP レスポンスに変換されるエラー
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor() {
    super(404, "Not Found");
    this.name = "NotFoundError";
  }
}

export class ForbiddenError extends HttpError {
  constructor() {
    super(403, "Forbidden");
    this.name = "ForbiddenError";
  }
}

/**
 * 一意制約違反（メールアドレス・タイトルの重複）
 */
export class ConflictError extends Error {
  constructor(readonly field: "email" | "title") {
    super(`Duplicate value for ${field}`);
    this.name = "ConflictError";
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}
