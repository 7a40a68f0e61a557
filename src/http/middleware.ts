import type { ErrorRequestHandler, RequestHandler } from "express";
import { HttpError } from "../errors";

export const requestLogger: RequestHandler = (req, res, next) => {
  const start = Date.now();
  res.on("finish", () => {
    console.log(
      `${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`
    );
  });
  next();
};

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ error: "Not Found" });
};

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  const clientError = exposedClientError(err);
  if (clientError) {
    res.status(clientError.status).json({ error: clientError.message });
    return;
  }
  console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, err);
  res.status(500).json({ error: "Internal server error" });
};

/**
 * body-parser などが付ける status / expose を持つ 4xx エラー
 */
function exposedClientError(
  err: unknown
): { status: number; message: string } | null {
  if (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500 &&
    "expose" in err &&
    err.expose === true
  ) {
    return { status: err.status, message: err.message };
  }
  return null;
}
