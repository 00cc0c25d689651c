import { describe, expect, it } from "vitest";
import { requestContextService } from "../../src/utils/internal/requestContext.js";

describe("requestContextService", () => {
  it("creates a fresh id per context", () => {
    const first = requestContextService.createRequestContext();
    const second = requestContextService.createRequestContext();
    expect(first.requestId).not.toBe(second.requestId);
  });

  it("merges configured values and lets additional fields win", () => {
    requestContextService.configure({ appName: "causal-test", environment: "test" });
    const parent = requestContextService.createRequestContext({ operation: "parent" });
    const child = requestContextService.createRequestContext({ ...parent, operation: "child" });

    expect(child.appName).toBe("causal-test");
    expect(child.environment).toBe("test");
    expect(child.requestId).toBe(parent.requestId);
    expect(child.operation).toBe("child");
  });
});
