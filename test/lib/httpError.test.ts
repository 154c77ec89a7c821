import { describe, expect, it } from "vitest";
import { z } from "zod";
import { HttpError, httpError, toHttpError } from "../../src/lib/httpError.js";
import { TransitionError } from "../../src/services/transitionEngine.js";
import { ZoneConfigError } from "../../src/services/zoneRegistry.js";

describe("toHttpError", () => {
  it("normalizes explicit error codes to lower snake case", () => {
    const normalized = toHttpError(httpError(400, "INVALID-PAYLOAD", "Payload failed"));
    expect(normalized).toEqual({
      statusCode: 400,
      body: { error: "invalid_payload", message: "Payload failed" },
    });
  });

  it("merges metadata fields into the response body", () => {
    const normalized = toHttpError(httpError(404, "vehicle_not_found", "missing", {
      vehicle_id: "MH12AB1234",
      ignored: undefined,
    }));
    expect(normalized.body).toEqual({ error: "vehicle_not_found", message: "missing", vehicle_id: "MH12AB1234" });
  });

  it("omits the message when it repeats the code", () => {
    expect(toHttpError(httpError(400, "invalid_request")).body).toEqual({ error: "invalid_request" });
    expect(httpError(400, "invalid_request")).toBeInstanceOf(HttpError);
  });

  it("maps transition errors by reason and status", () => {
    const future = toHttpError(new TransitionError("FUTURE_TIMESTAMP", "Timestamp cannot be in the future."));
    expect(future).toEqual({
      statusCode: 400,
      body: { error: "future_timestamp", message: "Timestamp cannot be in the future." },
    });

    const conflict = toHttpError(new TransitionError("STATE_CONFLICT", "changed", 409));
    expect(conflict.statusCode).toBe(409);
    expect(conflict.body.error).toBe("state_conflict");
  });

  it("resolves codes by precedence: code, then reason, then status default", () => {
    expect(toHttpError({ statusCode: 403, code: "Custom-Code", reason: "FORBIDDEN" }).body.error).toBe("custom_code");
    expect(toHttpError({ statusCode: 403, reason: "DEVICE_FORBIDDEN" }).body.error).toBe("device_forbidden");
    expect(toHttpError({ statusCode: 404 }).body.error).toBe("not_found");
  });

  it("hides internal messages of unexpected errors", () => {
    expect(toHttpError(new Error("boom"))).toEqual({ statusCode: 500, body: { error: "unexpected_error" } });
    expect(toHttpError(new ZoneConfigError("DUPLICATE_ZONE_ID", "duplicate zone id: a", "a"))).toEqual({
      statusCode: 500,
      body: { error: "duplicate_zone_id" },
    });
  });

  it("reports zod failures as invalid_request with details", () => {
    const parsed = z.object({ lat: z.number() }).safeParse({ lat: "north" });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    const normalized = toHttpError(parsed.error);
    expect(normalized.statusCode).toBe(400);
    expect(normalized.body).toMatchObject({
      error: "invalid_request",
      message: "Validation failed",
      details: { fieldErrors: { lat: ["Expected number, received string"] } },
    });
  });
});
