import type { ConfigType } from "@nestjs/config";
import { JwtService } from "@nestjs/jwt";
import type { Response } from "express";
import { beforeEach, describe, expect, it, vi } from "vitest";

import type appConfig from "../../../modules/config-management/configs/app.config";
import { LogFormat } from "../../../modules/config-management/types/config.types";
import type { ContextualRequest } from "../../types/request-context.type";
import { TraceMiddleware } from "../trace.middleware";

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

const config: ConfigType<typeof appConfig> = {
  port: 6655,
  appEnv: "test",
  agentName: "history-test",
  logLevel: "log",
  logFormat: LogFormat.TEXT,
};

const createRequest = (
  headers: Record<string, string | string[]> = {},
): ContextualRequest =>
  ({
    headers,
    method: "GET",
    originalUrl: "/v1/history/t1?verbose=true",
  }) as unknown as ContextualRequest;

describe("TraceMiddleware", () => {
  const jwtService = new JwtService({ secret: "test-secret" });
  let middleware: TraceMiddleware;
  let response: {
    setHeader: ReturnType<typeof vi.fn>;
    on: ReturnType<typeof vi.fn>;
    statusCode: number;
  };

  beforeEach(() => {
    vi.clearAllMocks();
    middleware = new TraceMiddleware(jwtService, config);
    response = { setHeader: vi.fn(), on: vi.fn(), statusCode: 200 };
  });

  describe("createContext", () => {
    it("should fall back to unknown for everything the request lacks", () => {
      expect(middleware.createContext(createRequest(), "trace-1")).toEqual({
        traceId: "trace-1",
        clientName: "unknown",
        clientVersion: "unknown",
        jwtClientId: "unknown",
        jwtUsername: "unknown",
        httpOrigin: "unknown",
        httpMethod: "GET",
        httpPath: "/v1/history/t1",
        userAgent: "unknown",
      });
    });

    it("should read client details from the first matching header", () => {
      const context = middleware.createContext(
        createRequest({
          "app-name": "fallback-app",
          "x-client-name": "web",
          "client-version": "2.1.0",
          host: "history.local",
          "user-agent": "vitest",
        }),
        "trace-2",
      );

      expect(context).toMatchObject({
        clientName: "web",
        clientVersion: "2.1.0",
        httpOrigin: "history.local",
        userAgent: "vitest",
      });
    });

    it("should prefer the origin header over host", () => {
      const context = middleware.createContext(
        createRequest({ origin: "https://app.test", host: "history.local" }),
        "trace-3",
      );

      expect(context.httpOrigin).toBe("https://app.test");
    });

    it("should read client id and username from unverified token claims", () => {
      const token = jwtService.sign({
        client_id: "history-ui",
        preferred_username: "jdoe",
      });

      const context = middleware.createContext(
        createRequest({ authorization: `Bearer ${token}` }),
        "trace-4",
      );

      expect(context.jwtClientId).toBe("history-ui");
      expect(context.jwtUsername).toBe("jdoe");
    });

    it("should prefer azp over the other client id claims", () => {
      const token = jwtService.sign({ azp: "web-client", clientId: "other" });

      const context = middleware.createContext(
        createRequest({ authorization: `Bearer ${token}` }),
        "trace-5",
      );

      expect(context.jwtClientId).toBe("web-client");
    });

    it("should ignore tokens that cannot be decoded", () => {
      const context = middleware.createContext(
        createRequest({ authorization: "Bearer not-a-jwt" }),
        "trace-6",
      );

      expect(context.jwtClientId).toBe("unknown");
      expect(context.jwtUsername).toBe("unknown");
    });
  });

  describe("use", () => {
    it("should attach the context and expose the trace id", () => {
      const request = createRequest();
      const next = vi.fn();

      middleware.use(request, response as unknown as Response, next);

      const traceId = request.context?.traceId;
      expect(traceId).toMatch(
        /^history-test-test-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
      );
      expect(response.setHeader).toHaveBeenCalledWith("X-Trace-ID", traceId);
      expect(next).toHaveBeenCalledTimes(1);
      expect(mockLogger.log).toHaveBeenCalledWith(
        `[${traceId}] Request started: GET /v1/history/t1`,
      );
    });

    it("should log completion once the response is sent", () => {
      const request = createRequest();

      middleware.use(request, response as unknown as Response, vi.fn());

      expect(response.on).toHaveBeenCalledWith("finish", expect.any(Function));
      const [, onFinish] = response.on.mock.calls[0];
      onFinish();

      expect(mockLogger.log).toHaveBeenLastCalledWith(
        expect.stringMatching(
          /Request completed: GET \/v1\/history\/t1 - Status: 200 - Duration: \d+\.\d{3}s$/,
        ),
      );
    });
  });
});
