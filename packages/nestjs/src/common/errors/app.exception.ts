import { HttpException, HttpStatus } from "@nestjs/common";

export interface AppExceptionCodeDefinition {
  status: HttpStatus;
  message: string;
  errorCode: string;
}

/**
 * Error codes for this service, each tied to an HTTP status.
 */
export const AppExceptionCode = {
  BAD_REQUEST_ERROR: {
    status: HttpStatus.BAD_REQUEST,
    message: "Bad Request",
    errorCode: "E_001",
  },
  NOT_FOUND_ERROR: {
    status: HttpStatus.NOT_FOUND,
    message: "Not Found",
    errorCode: "E_002",
  },
  INTERNAL_SERVER_ERROR: {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    message: "Internal Server Error",
    errorCode: "E_003",
  },
  UNAUTHORISED_ACCESS_ERROR: {
    status: HttpStatus.UNAUTHORIZED,
    message: "Unauthorized",
    errorCode: "E_004",
  },
  FORBIDDEN_ACCESS_ERROR: {
    status: HttpStatus.FORBIDDEN,
    message: "Forbidden",
    errorCode: "E_005",
  },
} as const satisfies Record<string, AppExceptionCodeDefinition>;

export interface AppErrorBody {
  detail_message: string;
  message: string;
  error_code: string;
}

export class AppException extends HttpException {
  readonly detailMessage: string;
  readonly code: AppExceptionCodeDefinition;

  constructor(
    detailMessage: string,
    code: AppExceptionCodeDefinition = AppExceptionCode.INTERNAL_SERVER_ERROR,
    options?: { cause?: unknown },
  ) {
    const body: AppErrorBody = {
      detail_message: detailMessage,
      message: code.message,
      error_code: code.errorCode,
    };
    super(body, code.status, options);

    this.detailMessage = detailMessage;
    this.code = code;
  }

  toBody(): AppErrorBody {
    return {
      detail_message: this.detailMessage,
      message: this.code.message,
      error_code: this.code.errorCode,
    };
  }
}
