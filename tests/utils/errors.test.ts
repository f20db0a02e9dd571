import { describe, it, expect } from "vitest";
import {
  PocketError,
  PocketAPIError,
  PocketAuthError,
  PocketBadRequestError,
  PocketConfigError,
  PocketDecodeError,
  PocketForbiddenError,
  PocketTransportError,
  PocketUnavailableError,
  PocketValidationError,
  UNKNOWN_ERROR_CODE,
  UNKNOWN_ERROR_MESSAGE,
  createAPIError,
  isRetryableError,
} from "../../src/utils/errors.js";

describe("Error Classes", () => {
  describe("PocketError", () => {
    it("should create base error with message and code", () => {
      const error = new PocketError("Test error", "TEST_CODE");
      expect(error.message).toBe("Test error");
      expect(error.code).toBe("TEST_CODE");
      expect(error.name).toBe("PocketError");
      expect(error).toBeInstanceOf(Error);
    });

    it("should include cause when provided", () => {
      const cause = new Error("Original error");
      const error = new PocketError("Wrapped error", "WRAP", cause);
      expect(error.cause).toBe(cause);
    });
  });

  describe("PocketAPIError", () => {
    it("should carry header details", () => {
      const error = new PocketAPIError(500, {
        errorCode: 199,
        errorMessage: "Pocket server issue",
        responseBody: "oops",
      });
      expect(error.statusCode).toBe(500);
      expect(error.errorCode).toBe(199);
      expect(error.errorMessage).toBe("Pocket server issue");
      expect(error.responseBody).toBe("oops");
      expect(error.code).toBe("HTTP_500");
      expect(error.message).toBe("Pocket API error: 500 (199) Pocket server issue");
    });

    it("should fall back to unknown values", () => {
      const error = new PocketAPIError(418);
      expect(error.errorCode).toBe(UNKNOWN_ERROR_CODE);
      expect(error.errorMessage).toBe(UNKNOWN_ERROR_MESSAGE);
      expect(error.message).toBe("Pocket API error: 418 (0) Unknown error");
    });
  });

  describe("status subclasses", () => {
    it("should create a bad request error with 400 status", () => {
      const error = new PocketBadRequestError();
      expect(error.statusCode).toBe(400);
      expect(error.name).toBe("PocketBadRequestError");
    });

    it("should create an auth error with 401 status", () => {
      const error = new PocketAuthError({ errorCode: 107 });
      expect(error.statusCode).toBe(401);
      expect(error.errorCode).toBe(107);
      expect(error.name).toBe("PocketAuthError");
    });

    it("should create a forbidden error with 403 status", () => {
      const error = new PocketForbiddenError();
      expect(error.statusCode).toBe(403);
      expect(error.isRateLimited).toBe(false);
    });

    it("should flag an exhausted key limit", () => {
      const error = new PocketForbiddenError({ rateLimit: { keyRemaining: 0 } });
      expect(error.isRateLimited).toBe(true);
    });

    it("should create an unavailable error with 503 status", () => {
      const error = new PocketUnavailableError();
      expect(error.statusCode).toBe(503);
      expect(error.name).toBe("PocketUnavailableError");
    });
  });

  describe("PocketTransportError", () => {
    it("should use NETWORK_ERROR for network failures", () => {
      const error = new PocketTransportError("Connection refused", "network");
      expect(error.code).toBe("NETWORK_ERROR");
      expect(error.kind).toBe("network");
    });

    it("should use TIMEOUT for timeouts", () => {
      const error = new PocketTransportError("Timed out", "timeout");
      expect(error.code).toBe("TIMEOUT");
    });
  });

  describe("PocketDecodeError", () => {
    it("should keep the raw body", () => {
      const error = new PocketDecodeError("bad json", 200, "{oops");
      expect(error.code).toBe("DECODE_ERROR");
      expect(error.statusCode).toBe(200);
      expect(error.responseBody).toBe("{oops");
    });
  });

  describe("PocketConfigError and PocketValidationError", () => {
    it("should list issues", () => {
      expect(new PocketConfigError("bad", ["a: missing"]).issues).toEqual(["a: missing"]);
      expect(new PocketValidationError("bad").issues).toEqual([]);
      expect(new PocketValidationError("bad").code).toBe("VALIDATION_ERROR");
    });
  });
});

describe("createAPIError", () => {
  it.each([
    { status: 400, type: PocketBadRequestError },
    { status: 401, type: PocketAuthError },
    { status: 403, type: PocketForbiddenError },
    { status: 503, type: PocketUnavailableError },
  ])("should map $status to its subclass", ({ status, type }) => {
    const error = createAPIError(status, { errorCode: 1 });
    expect(error).toBeInstanceOf(type);
    expect(error.statusCode).toBe(status);
    expect(error.errorCode).toBe(1);
  });

  it("should use the generic class for other statuses", () => {
    const error = createAPIError(502);
    expect(error.constructor).toBe(PocketAPIError);
    expect(error.statusCode).toBe(502);
  });
});

describe("isRetryableError", () => {
  it("should retry transport errors", () => {
    expect(isRetryableError(new PocketTransportError("x", "network"))).toBe(true);
    expect(isRetryableError(new PocketTransportError("x", "timeout"))).toBe(true);
  });

  it("should retry 5xx responses", () => {
    expect(isRetryableError(new PocketUnavailableError())).toBe(true);
    expect(isRetryableError(new PocketAPIError(500))).toBe(true);
  });

  it("should not retry client errors or decode errors", () => {
    expect(isRetryableError(new PocketAuthError())).toBe(false);
    expect(isRetryableError(new PocketForbiddenError())).toBe(false);
    expect(isRetryableError(new PocketDecodeError("x", 200, ""))).toBe(false);
    expect(isRetryableError(new Error("x"))).toBe(false);
  });
});
