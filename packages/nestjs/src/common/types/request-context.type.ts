import type { Request } from "express";

/**
 * Per-request logging context, built once by the trace middleware and passed
 * explicitly to whatever needs it.
 */
export interface RequestContext {
  traceId: string;
  clientName: string;
  clientVersion: string;
  jwtClientId: string;
  jwtUsername: string;
  httpOrigin: string;
  httpMethod: string;
  httpPath: string;
  userAgent: string;
}

export type ContextualRequest<T extends Request = Request> = T & {
  context?: RequestContext;
};

export const withTrace = (
  context: RequestContext | undefined,
  message: string,
): string => (context ? `[${context.traceId}] ${message}` : message);
