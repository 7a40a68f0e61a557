import { ForbiddenError } from "../errors";
import { Comment } from "../models/types";
import { AuthenticatedIdentity, Identity } from "./identity";

export function isAdministrator(identity: Identity): boolean {
  return identity.authenticated && identity.user.role === "admin";
}

/**
 * 対象のコメントそのものの作成者かどうか
 */
export function isCommentOwner(
  identity: Identity,
  comment: Pick<Comment, "authorId">
): boolean {
  return identity.authenticated && identity.user.id === comment.authorId;
}

export function requireAuthenticated(
  identity: Identity
): AuthenticatedIdentity {
  if (!identity.authenticated) {
    throw new ForbiddenError();
  }
  return identity;
}

export function requireAdministrator(
  identity: Identity
): AuthenticatedIdentity {
  const authenticated = requireAuthenticated(identity);
  if (!isAdministrator(authenticated)) {
    throw new ForbiddenError();
  }
  return authenticated;
}

export function requireCommentOwner(
  identity: Identity,
  comment: Pick<Comment, "authorId">
): AuthenticatedIdentity {
  const authenticated = requireAuthenticated(identity);
  if (!isCommentOwner(authenticated, comment)) {
    throw new ForbiddenError();
  }
  return authenticated;
}
