import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import type { Response } from "express";

import {
  type AppErrorBody,
  AppException,
  AppExceptionCode,
  type AppExceptionCodeDefinition,
} from "../errors/app.exception";
import { type ContextualRequest, withTrace } from "../types/request-context.type";

const CODES_BY_STATUS = new Map<number, AppExceptionCodeDefinition>([
  [HttpStatus.BAD_REQUEST, AppExceptionCode.BAD_REQUEST_ERROR],
  [HttpStatus.UNAUTHORIZED, AppExceptionCode.UNAUTHORISED_ACCESS_ERROR],
  [HttpStatus.FORBIDDEN, AppExceptionCode.FORBIDDEN_ACCESS_ERROR],
  [HttpStatus.NOT_FOUND, AppExceptionCode.NOT_FOUND_ERROR],
]);

/**
 * Renders every error as `{ detail_message, message, error_code }`.
 */
@Catch()
export class AppExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AppExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<ContextualRequest>();

    const detail =
      exception instanceof Error ? exception.message : String(exception);
    const location = `request_method=${request.method}, request_path=${request.path}`;

    if (response.headersSent || response.destroyed) {
      this.logger.warn(
        withTrace(
          request.context,
          `Response already closed for ${location}, error=${detail}`,
        ),
      );
      return;
    }

    const [status, body] = this.toResponse(exception, detail);

    if (status >= 500) {
      this.logger.error(
        withTrace(
          request.context,
          `Unhandled exception occurred for ${location}, error=${detail}`,
        ),
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(
        withTrace(
          request.context,
          `App exception occurred for ${location}, error=${detail}`,
        ),
      );
    }

    response.status(status).json(body);
  }

  private toResponse(
    exception: unknown,
    detail: string,
  ): [number, AppErrorBody] {
    if (exception instanceof AppException) {
      return [exception.getStatus(), exception.toBody()];
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const code =
        CODES_BY_STATUS.get(status) ?? AppExceptionCode.INTERNAL_SERVER_ERROR;

      return [
        status,
        {
          detail_message: detail,
          message: code.message,
          error_code: code.errorCode,
        },
      ];
    }

    const code = AppExceptionCode.INTERNAL_SERVER_ERROR;
    return [
      code.status,
      {
        detail_message: detail,
        message: code.message,
        error_code: code.errorCode,
      },
    ];
  }
}
