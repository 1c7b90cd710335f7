import type { Request } from "express";

import type { ContextualRequest } from "../../../common/types/request-context.type";

export type AuthenticatedRequest<T extends Request = Request> =
  ContextualRequest<T> & {
    user?: JwtPayload;
  };

/**
 * Claims read from a bearer token. Only the ones used for logging are named.
 */
export interface JwtPayload {
  sub?: string;
  azp?: string;
  client_id?: string;
  clientId?: string;
  preferred_username?: string;
  [claim: string]: unknown;
}
