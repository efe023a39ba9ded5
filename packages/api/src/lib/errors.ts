import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";

import type { AppEnv } from "../types/env.js";
import { logger } from "./logger.js";

export type ErrorCode =
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "CONFLICT"
  | "VALIDATION_ERROR"
  | "MALFORMED_KEY"
  | "UNVERIFIED_IDENTITY"
  | "STORAGE_ERROR"
  | "RATE_LIMITED"
  | "INTERNAL_ERROR";

export class AppError extends Error {
  code: ErrorCode;
  status: ContentfulStatusCode;
  details?: unknown;

  constructor(opts: {
    code: ErrorCode;
    status: ContentfulStatusCode;
    message: string;
    details?: unknown;
    cause?: unknown;
  }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = opts.code;
    this.status = opts.status;
    this.details = opts.details;
  }
}

// ============================================================
// GPG key taxonomy
// ============================================================

/** The armored text does not decode to a public key entity. */
export class MalformedKeyError extends AppError {
  constructor(message: string, details?: unknown) {
    super({ code: "MALFORMED_KEY", status: 422, message, details });
  }
}

/** An identity in the key is not a verified email of the submitting owner. */
export class UnverifiedIdentityError extends AppError {
  constructor(message: string, details: { identity?: string; email?: string }) {
    super({ code: "UNVERIFIED_IDENTITY", status: 422, message, details });
  }
}

export class KeyIdConflictError extends AppError {
  readonly keyId: string;

  constructor(keyId: string) {
    super({
      code: "CONFLICT",
      status: 409,
      message: `A key with ID ${keyId} is already registered`,
      details: { keyId },
    });
    this.keyId = keyId;
  }
}

export class KeyNotFoundError extends AppError {
  constructor(id: number) {
    super({
      code: "NOT_FOUND",
      status: 404,
      message: "gpg_key not found",
      details: { resource: "gpg_key", id: String(id) },
    });
  }
}

export class AccessDeniedError extends AppError {
  constructor(message = "You do not have access to this key") {
    super({ code: "FORBIDDEN", status: 403, message });
  }
}

/** Opaque wrapper for transaction failures. The cause is kept for logs only. */
export class StorageError extends AppError {
  constructor(cause: unknown) {
    super({ code: "STORAGE_ERROR", status: 500, message: "Storage error", cause });
  }
}

// ============================================================
// Generic helpers
// ============================================================

export function unauthorized(message = "Unauthorized") {
  return new AppError({ code: "UNAUTHORIZED", status: 401, message });
}

export function forbidden(message = "Forbidden") {
  return new AppError({ code: "FORBIDDEN", status: 403, message });
}

export function validationError(message = "Validation failed", details?: unknown) {
  return new AppError({ code: "VALIDATION_ERROR", status: 422, message, details });
}

// Postgres unique_violation, possibly wrapped by the driver or the ORM.
function findUniqueViolation(err: unknown): object | null {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Object; depth++) {
    if ("code" in current && current.code === "23505") return current;
    current = "cause" in current ? current.cause : undefined;
  }
  return null;
}

export function isUniqueViolation(err: unknown): boolean {
  return findUniqueViolation(err) !== null;
}

/**
 * The duplicated value of `column`, read from the violation's detail line
 * (`Key (key_id)=(...) already exists.`). Null when the detail is missing.
 */
export function uniqueViolationValue(err: unknown, column: string): string | null {
  const violation = findUniqueViolation(err);
  if (!violation || !("detail" in violation) || typeof violation.detail !== "string") return null;
  const match = new RegExp(`^Key \\(${column}\\)=\\((.*)\\) already exists`).exec(violation.detail);
  return match?.[1] ?? null;
}

export function toErrorResponse(c: Context<AppEnv>, err: unknown): Response {
  const requestId = c.get("requestId") ?? c.req.header("x-request-id") ?? undefined;

  if (err instanceof AppError) {
    if (err instanceof StorageError) {
      logger.error({ err: err.cause, requestId }, "Storage error");
    }
    return c.json(
      {
        error: {
          code: err.code,
          message: err.message,
          status: err.status,
          details: err.details,
          requestId,
        },
      },
      err.status
    );
  }

  if (err instanceof ZodError) {
    const e = validationError("Validation failed", err.issues);
    return c.json(
      {
        error: {
          code: e.code,
          message: e.message,
          status: e.status,
          details: e.details,
          requestId,
        },
      },
      e.status
    );
  }

  logger.error({ err, requestId }, "Unhandled error");
  return c.json(
    {
      error: {
        code: "INTERNAL_ERROR",
        message: "Internal error",
        status: 500,
        requestId,
      },
    },
    500
  );
}
