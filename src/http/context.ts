import type { Request, RequestHandler, Response } from "express";
import { Identity } from "../auth/identity";
import { isAdministrator } from "../auth/policy";
import { currentIdentity, pushFlash, takeFlash } from "../auth/session";
import { NotFoundError } from "../errors";
import { BlogStore } from "../store/store";

export interface AppDeps {
  store: BlogStore;
  bcryptRounds: number;
  now: () => Date;
}

export type ViewData = Record<string, unknown>;

/**
 * ハンドラへ明示的に渡すリクエスト単位のコンテキスト
 */
export interface RequestContext {
  readonly identity: Identity;
  readonly deps: AppDeps;
  readonly req: Request;
  readonly res: Response;
  render(view: string, data?: ViewData, status?: number): void;
  redirect(path: string): void;
  flash(message: string): void;
}

export type RouteHandler = (ctx: RequestContext) => Promise<void>;

export function createContext(
  deps: AppDeps,
  identity: Identity,
  req: Request,
  res: Response
): RequestContext {
  return {
    identity,
    deps,
    req,
    res,
    render: (view, data = {}, status = 200) => {
      res.status(status).json({
        view,
        loggedIn: identity.authenticated,
        currentUser: identity.authenticated ? identity.user : null,
        isAdmin: isAdministrator(identity),
        messages: takeFlash(req),
        ...data,
      });
    },
    redirect: (path) => res.redirect(path),
    flash: (message) => pushFlash(req, message),
  };
}

/**
 * セッションから identity を解決してハンドラを呼ぶ。失敗はエラーミドルウェアへ
 */
export function handle(deps: AppDeps, handler: RouteHandler): RequestHandler {
  return (req, res, next) => {
    currentIdentity(deps.store.users, req)
      .then((identity) => handler(createContext(deps, identity, req, res)))
      .catch(next);
  };
}

// id 列は SERIAL (int4)
const MAX_ID = 2147483647;

export function parseId(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new NotFoundError();
  }
  const id = Number(value);
  if (!Number.isSafeInteger(id) || id < 1 || id > MAX_ID) {
    throw new NotFoundError();
  }
  return id;
}
