import { Inject, Injectable, Logger, type NestMiddleware } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import type { NextFunction, Response } from "express";

import requestLoggingConfig from "../../modules/config-management/configs/request-logging.config";
import { type ContextualRequest, withTrace } from "../types/request-context.type";

const REDACTED_HEADERS = new Set([
  "authorization",
  "cookie",
  "x-token",
  "proxy-authorization",
]);

export const truncate = (text: string, maxSize: number): string =>
  maxSize > 0 && text.length > maxSize
    ? `${text.slice(0, maxSize)}...[truncated]`
    : text;

/**
 * Logs each request and its response, with headers and body when
 * configured.
 */
@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger(RequestLoggingMiddleware.name);

  constructor(
    @Inject(requestLoggingConfig.KEY)
    private readonly config: ConfigType<typeof requestLoggingConfig>,
  ) {}

  use(request: ContextualRequest, response: Response, next: NextFunction) {
    if (!this.config.enabled) {
      next();
      return;
    }

    const startTime = Date.now();

    this.logger.log(
      withTrace(
        request.context,
        `Incoming request: ${JSON.stringify(this.describeRequest(request))}`,
      ),
    );

    response.on("finish", () => {
      this.logger.log(
        withTrace(
          request.context,
          `Outgoing response: ${JSON.stringify({
            method: request.method,
            path: request.originalUrl,
            status: response.statusCode,
            durationMs: Date.now() - startTime,
          })}`,
        ),
      );
    });

    next();
  }

  describeRequest(request: ContextualRequest): Record<string, unknown> {
    const description: Record<string, unknown> = {
      method: request.method,
      path: request.originalUrl,
    };

    if (this.config.logHeaders) {
      description.headers = Object.fromEntries(
        Object.entries(request.headers).map(([name, value]) => [
          name,
          REDACTED_HEADERS.has(name) ? "[redacted]" : value,
        ]),
      );
    }

    const body: unknown = request.body;

    if (this.config.logBody && body !== undefined) {
      const text = typeof body === "string" ? body : JSON.stringify(body);
      description.body = truncate(text, this.config.bodyMaxSize);
    }

    return description;
  }
}
