import {
  type ArgumentsHost,
  BadRequestException,
  ForbiddenException,
  HttpStatus,
  NotFoundException,
  ServiceUnavailableException,
  UnauthorizedException,
} from "@nestjs/common";
import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  AppException,
  AppExceptionCode,
} from "../../errors/app.exception";
import { AppExceptionFilter } from "../app-exception.filter";

const mockLogger = {
  log: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

vi.mock("@nestjs/common", async () => {
  const actual =
    await vi.importActual<typeof import("@nestjs/common")>("@nestjs/common");
  return {
    ...actual,
    Logger: vi.fn().mockImplementation(() => mockLogger),
  };
});

describe("AppExceptionFilter", () => {
  let filter: AppExceptionFilter;
  let response: {
    headersSent: boolean;
    destroyed: boolean;
    status: ReturnType<typeof vi.fn>;
    json: ReturnType<typeof vi.fn>;
  };
  let host: ArgumentsHost;

  beforeEach(() => {
    vi.clearAllMocks();
    filter = new AppExceptionFilter();
    response = {
      headersSent: false,
      destroyed: false,
      status: vi.fn(),
      json: vi.fn(),
    };
    response.status.mockReturnValue(response);

    const request = {
      method: "GET",
      path: "/v1/history/t1",
      context: { traceId: "trace-1" },
    };
    host = {
      switchToHttp: () => ({
        getResponse: () => response,
        getRequest: () => request,
      }),
    } as unknown as ArgumentsHost;
  });

  it("should render an AppException with its own code", () => {
    filter.catch(
      new AppException(
        "Token rejected",
        AppExceptionCode.UNAUTHORISED_ACCESS_ERROR,
      ),
      host,
    );

    expect(response.status).toHaveBeenCalledWith(HttpStatus.UNAUTHORIZED);
    expect(response.json).toHaveBeenCalledWith({
      detail_message: "Token rejected",
      message: "Unauthorized",
      error_code: "E_004",
    });
  });

  it.each([
    [new BadRequestException("threadId must be a string"), 400, "Bad Request", "E_001"],
    [new UnauthorizedException("Access token is required"), 401, "Unauthorized", "E_004"],
    [new ForbiddenException("No access"), 403, "Forbidden", "E_005"],
    [new NotFoundException("Cannot GET /nope"), 404, "Not Found", "E_002"],
    [
      new ServiceUnavailableException("Down"),
      503,
      "Internal Server Error",
      "E_003",
    ],
  ])("should map %s onto the error envelope", (exception, status, message, code) => {
    filter.catch(exception, host);

    expect(response.status).toHaveBeenCalledWith(status);
    expect(response.json).toHaveBeenCalledWith({
      detail_message: exception.message,
      message,
      error_code: code,
    });
  });

  it("should render unknown errors as internal server errors", () => {
    filter.catch(new Error("kaboom"), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith({
      detail_message: "kaboom",
      message: "Internal Server Error",
      error_code: "E_003",
    });
    expect(mockLogger.error).toHaveBeenCalledWith(
      "[trace-1] Unhandled exception occurred for request_method=GET, request_path=/v1/history/t1, error=kaboom",
      expect.any(String),
    );
  });

  it("should write nothing once headers are sent", () => {
    response.headersSent = true;

    filter.catch(new Error("late failure"), host);

    expect(response.status).not.toHaveBeenCalled();
    expect(response.json).not.toHaveBeenCalled();
  });
});

describe("AppException", () => {
  it("should default to an internal server error", () => {
    const exception = new AppException("Something broke");

    expect(exception.getStatus()).toBe(500);
    expect(exception.getResponse()).toEqual({
      detail_message: "Something broke",
      message: "Internal Server Error",
      error_code: "E_003",
    });
  });

  it("should keep the status of its code", () => {
    const exception = new AppException(
      "No access to this thread",
      AppExceptionCode.FORBIDDEN_ACCESS_ERROR,
    );

    expect(exception.getStatus()).toBe(403);
    expect(exception.toBody().error_code).toBe("E_005");
  });
});
