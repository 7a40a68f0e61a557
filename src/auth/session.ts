import type { Request } from "express";
import { NotFoundError } from "../errors";
import { User, toPublicUser } from "../models/types";
import { UserRepository } from "../store/store";
import { ANONYMOUS, Identity } from "./identity";

function requireSession(req: Request) {
  if (!req.session) {
    throw new Error("Session middleware is not configured");
  }
  return req.session;
}

export function login(req: Request, user: Pick<User, "id">): void {
  requireSession(req).userId = user.id;
}

export function logout(req: Request): void {
  req.session = null;
}

export function getSessionUserId(req: Request): number | null {
  const value: unknown = req.session?.userId;
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

/**
 * セッションに紐づくユーザーを読み込む。
 * 保存された id のユーザーが既に存在しない場合は紐づけを外して NotFoundError
 */
export async function currentIdentity(
  users: UserRepository,
  req: Request
): Promise<Identity> {
  const userId = getSessionUserId(req);
  if (userId === null) {
    return ANONYMOUS;
  }

  const user = await users.findById(userId);
  if (!user) {
    delete requireSession(req).userId;
    throw new NotFoundError();
  }

  return { authenticated: true, user: toPublicUser(user) };
}

export function pushFlash(req: Request, message: string): void {
  const session = requireSession(req);
  session.flash = [...readFlash(session.flash), message];
}

/**
 * キューにあるフラッシュメッセージを取り出して空にする
 */
export function takeFlash(req: Request): string[] {
  const session = req.session;
  if (!session) {
    return [];
  }
  const messages = readFlash(session.flash);
  if (messages.length > 0) {
    delete session.flash;
  }
  return messages;
}

function readFlash(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string");
}
