import { describe, expect, it } from "vitest";
import { z } from "zod";
import { BaseErrorCode, McpError } from "../../src/types-global/errors.js";
import { ErrorHandler } from "../../src/utils/index.js";

class CodedError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
  }
}

describe("ErrorHandler.determineErrorCode", () => {
  it("classifies known error shapes", () => {
    expect(ErrorHandler.determineErrorCode(new McpError(BaseErrorCode.CONFLICT, "x"))).toBe(BaseErrorCode.CONFLICT);
    expect(ErrorHandler.determineErrorCode(z.string().safeParse(1).error)).toBe(BaseErrorCode.VALIDATION_ERROR);
    expect(ErrorHandler.determineErrorCode(new CodedError("busy", "SQLITE_BUSY"))).toBe(BaseErrorCode.DATABASE_ERROR);
    expect(ErrorHandler.determineErrorCode(new CodedError("gone", "ENOENT"))).toBe(BaseErrorCode.NOT_FOUND);
    expect(ErrorHandler.determineErrorCode(new Error("Node does not exist"))).toBe(BaseErrorCode.NOT_FOUND);
    expect(ErrorHandler.determineErrorCode(new Error("boom"))).toBe(BaseErrorCode.INTERNAL_ERROR);
    expect(ErrorHandler.determineErrorCode("thrown string")).toBe(BaseErrorCode.UNKNOWN_ERROR);
  });
});

describe("ErrorHandler.handleError", () => {
  it("returns McpErrors unchanged", () => {
    const original = new McpError(BaseErrorCode.NOT_FOUND, "Node [x] does not exist in the model.");

    expect(ErrorHandler.handleError(original, { operation: "test" })).toBe(original);
  });

  it("turns Zod issues into a validation message", () => {
    const result = z.object({ nodeId: z.string() }).safeParse({ nodeId: 3 });
    const handled = ErrorHandler.handleError(result.error, { operation: "addNode" });

    expect(handled).toBeInstanceOf(McpError);
    expect(handled instanceof McpError ? handled.code : undefined).toBe(BaseErrorCode.VALIDATION_ERROR);
    expect(handled.message).toBe("Error in addNode: nodeId: Expected string, received number");
  });

  it("uses the fallback code for unclassified errors and rethrows on request", () => {
    expect(() =>
      ErrorHandler.handleError(new Error("boom"), {
        operation: "start",
        errorCode: BaseErrorCode.INITIALIZATION_FAILED,
        rethrow: true,
      }),
    ).toThrow("Error in start: boom");

    const handled = ErrorHandler.handleError(new Error("boom"), {
      operation: "start",
      errorCode: BaseErrorCode.INITIALIZATION_FAILED,
    });
    expect(handled instanceof McpError ? handled.code : undefined).toBe(BaseErrorCode.INITIALIZATION_FAILED);
  });
});

describe("ErrorHandler.tryCatch", () => {
  it("returns the value or rejects with the wrapped error", async () => {
    await expect(ErrorHandler.tryCatch(() => 42, { operation: "ok" })).resolves.toBe(42);
    await expect(
      ErrorHandler.tryCatch(
        () => {
          throw new Error("Reference already exists");
        },
        { operation: "add" },
      ),
    ).rejects.toMatchObject({ code: BaseErrorCode.CONFLICT, message: "Error in add: Reference already exists" });
  });
});
