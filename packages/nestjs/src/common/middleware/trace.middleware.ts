import { randomUUID } from "node:crypto";

import { Inject, Injectable, Logger, type NestMiddleware } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { JwtService } from "@nestjs/jwt";
import type { NextFunction, Response } from "express";

import appConfig from "../../modules/config-management/configs/app.config";
import type { ContextualRequest, RequestContext } from "../types/request-context.type";
import { isRecord, optionalString } from "../utils/record.utils";

export const TRACE_ID_HEADER = "X-Trace-ID";

const UNKNOWN = "unknown";

export const headerOf = (
  request: ContextualRequest,
  name: string,
): string | undefined => {
  const value = request.headers[name];
  return optionalString(Array.isArray(value) ? value[0] : value);
};

const firstHeader = (request: ContextualRequest, names: string[]): string =>
  names.reduce<string | undefined>(
    (found, name) => found ?? headerOf(request, name),
    undefined,
  ) ?? UNKNOWN;

/**
 * Gives every request a trace id and builds the `RequestContext` that log
 * lines further down are tagged with.
 */
@Injectable()
export class TraceMiddleware implements NestMiddleware {
  private readonly logger = new Logger(TraceMiddleware.name);

  constructor(
    private readonly jwtService: JwtService,
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  use(request: ContextualRequest, response: Response, next: NextFunction) {
    const traceId = `${this.config.agentName}-${this.config.appEnv}-${randomUUID()}`;
    const context = this.createContext(request, traceId);
    const startTime = Date.now();

    request.context = context;
    response.setHeader(TRACE_ID_HEADER, traceId);

    this.logger.log(
      `[${traceId}] Request started: ${context.httpMethod} ${context.httpPath}`,
    );

    response.on("finish", () => {
      const seconds = ((Date.now() - startTime) / 1000).toFixed(3);
      this.logger.log(
        `[${traceId}] Request completed: ${context.httpMethod} ${context.httpPath} - Status: ${response.statusCode} - Duration: ${seconds}s`,
      );
    });

    next();
  }

  createContext(request: ContextualRequest, traceId: string): RequestContext {
    const claims = this.extractClaims(request);
    const [httpPath] = request.originalUrl.split("?");

    return {
      traceId,
      clientName: firstHeader(request, [
        "x-client-name",
        "client-name",
        "x-app-name",
        "app-name",
      ]),
      clientVersion: firstHeader(request, [
        "x-client-version",
        "client-version",
        "x-app-version",
        "app-version",
      ]),
      jwtClientId:
        optionalString(claims.azp) ??
        optionalString(claims.client_id) ??
        optionalString(claims.clientId) ??
        UNKNOWN,
      jwtUsername: optionalString(claims.preferred_username) ?? UNKNOWN,
      httpOrigin: firstHeader(request, ["origin", "host"]),
      httpMethod: request.method,
      httpPath,
      userAgent: headerOf(request, "user-agent") ?? UNKNOWN,
    };
  }

  /**
   * Claims of the bearer token, unverified. Only used for logging.
   */
  private extractClaims(request: ContextualRequest): Record<string, unknown> {
    const authorization = headerOf(request, "authorization");

    if (!authorization?.startsWith("Bearer ")) {
      return {};
    }

    try {
      const claims: unknown = this.jwtService.decode(authorization.slice(7));
      return isRecord(claims) ? claims : {};
    } catch (error: unknown) {
      this.logger.debug(
        `Failed to extract JWT claims for logging: ${error instanceof Error ? error.message : String(error)}`,
      );
      return {};
    }
  }
}
