import express, { Express } from "express";
import cookieSession from "cookie-session";
import { AppDeps } from "./http/context";
import { errorHandler, notFoundHandler, requestLogger } from "./http/middleware";
import { createAuthRouter } from "./routes/auth";
import { createCommentsRouter } from "./routes/comments";
import { createPagesRouter } from "./routes/pages";
import { createPostsRouter } from "./routes/posts";

export interface AppOptions extends AppDeps {
  secretKey: string;
  secureCookies?: boolean;
  logRequests?: boolean;
}

export function createApp(options: AppOptions): Express {
  const deps: AppDeps = {
    store: options.store,
    bcryptRounds: options.bcryptRounds,
    now: options.now,
  };

  const app = express();
  app.disable("x-powered-by");

  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(express.urlencoded({ extended: false }));
  app.use(
    cookieSession({
      name: "session",
      keys: [options.secretKey],
      httpOnly: true,
      sameSite: "lax",
      secure: options.secureCookies ?? false,
    })
  );

  app.use(createPostsRouter(deps));
  app.use(createCommentsRouter(deps));
  app.use(createAuthRouter(deps));
  app.use(createPagesRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
