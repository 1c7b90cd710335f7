import { describe, expect, it } from "vitest";

import type { RequestContext } from "../../types/request-context.type";
import { ChatHistoryQuery } from "../chat-history.query";

describe("ChatHistoryQuery", () => {
  it("should carry the thread, context and signal", () => {
    const context: RequestContext = {
      traceId: "trace-1",
      clientName: "unknown",
      clientVersion: "unknown",
      jwtClientId: "unknown",
      jwtUsername: "unknown",
      httpOrigin: "unknown",
      httpMethod: "GET",
      httpPath: "/v1/history/thread-1",
      userAgent: "unknown",
    };
    const controller = new AbortController();

    const query = new ChatHistoryQuery({
      threadId: "thread-1",
      context,
      signal: controller.signal,
    });

    expect(query.threadId).toBe("thread-1");
    expect(query.context).toBe(context);
    expect(query.signal).toBe(controller.signal);
  });

  it("should create a query from a thread id alone", () => {
    const query = ChatHistoryQuery.create("thread-2");

    expect(query.threadId).toBe("thread-2");
    expect(query.context).toBeUndefined();
    expect(query.signal).toBeUndefined();
  });
});
