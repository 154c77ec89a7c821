import type { FastifyReply } from "fastify";
import { ZodError } from "zod";
import { TransitionError } from "../services/transitionEngine.js";
import { ZoneConfigError } from "../services/zoneRegistry.js";

export type NormalizedHttpError = {
  statusCode: number;
  body: Record<string, unknown>;
};

export type HttpErrorMetadata = Record<string, unknown>;

export class HttpError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly metadata: HttpErrorMetadata;

  constructor(statusCode: number, code: string, message?: string, metadata: HttpErrorMetadata = {}) {
    super(message ?? code);
    this.statusCode = statusCode;
    this.code = code;
    this.metadata = metadata;
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}

export function httpError(statusCode: number, error: string, message?: string, metadata?: HttpErrorMetadata): HttpError {
  return new HttpError(statusCode, error, message, metadata);
}

const STATUS_CODE_DEFAULTS: Record<number, string> = {
  400: "bad_request",
  401: "unauthorized",
  403: "forbidden",
  404: "not_found",
  409: "conflict",
  413: "payload_too_large",
  415: "unsupported_media_type",
  429: "rate_limited",
  500: "unexpected_error",
  503: "service_unavailable",
};

function normalizeCode(code: string): string {
  return code.trim().replace(/[^A-Za-z0-9]+/g, "_").replace(/^_+|_+$/g, "").toLowerCase();
}

function statusCodeFrom(err: unknown, fallbackStatusCode: number): number {
  const statusCode = typeof err === "object" && err && "statusCode" in err
    ? Number((err as { statusCode: unknown }).statusCode)
    : Number.NaN;
  return Number.isFinite(statusCode) && statusCode >= 100 && statusCode < 600 ? statusCode : fallbackStatusCode;
}

function stringField(err: unknown, field: "code" | "reason"): string | null {
  if (typeof err !== "object" || !err) return null;
  const value = (err as Record<string, unknown>)[field];
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

function errorCodeFrom(err: unknown, statusCode: number): string {
  if (err instanceof TransitionError || err instanceof ZoneConfigError) return normalizeCode(err.reason);
  const explicit = stringField(err, "code") ?? stringField(err, "reason");
  if (explicit) return normalizeCode(explicit);
  return STATUS_CODE_DEFAULTS[statusCode] ?? (statusCode >= 500 ? "unexpected_error" : "bad_request");
}

function messageFrom(err: unknown): string | undefined {
  if (err instanceof Error) return err.message;
  if (typeof err === "object" && err && "message" in err && typeof (err as { message?: unknown }).message === "string") {
    return (err as { message?: string }).message;
  }
  return undefined;
}

function withoutUndefined(metadata: HttpErrorMetadata): HttpErrorMetadata {
  return Object.fromEntries(Object.entries(metadata).filter(([, value]) => value !== undefined));
}

export function toHttpError(err: unknown, fallbackStatusCode = 500): NormalizedHttpError {
  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      body: { error: "invalid_request", message: "Validation failed", details: err.flatten() },
    };
  }
  const statusCode = statusCodeFrom(err, fallbackStatusCode);
  const error = errorCodeFrom(err, statusCode);
  const body: Record<string, unknown> = { error };
  // Internal failure details stay in the logs.
  const message = statusCode >= 500 && !(err instanceof HttpError) ? undefined : messageFrom(err);
  if (message && message !== error) body.message = message;
  if (err instanceof HttpError) Object.assign(body, withoutUndefined(err.metadata));
  return { statusCode, body };
}

export function sendHttpError(rep: FastifyReply, err: unknown, fallbackStatusCode = 500) {
  const normalized = toHttpError(err, fallbackStatusCode);
  return rep.code(normalized.statusCode).send(normalized.body);
}
