import { PublicUser } from "../models/types";

export type AuthenticatedIdentity = {
  readonly authenticated: true;
  readonly user: PublicUser;
};

export type AnonymousIdentity = {
  readonly authenticated: false;
};

export type Identity = AuthenticatedIdentity | AnonymousIdentity;

export const ANONYMOUS: AnonymousIdentity = { authenticated: false };

export function isAuthenticated(
  identity: Identity
): identity is AuthenticatedIdentity {
  return identity.authenticated;
}
