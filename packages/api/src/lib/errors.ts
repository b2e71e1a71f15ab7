import type { Context } from "hono";
import { ZodError } from "zod";
import { logger } from "./logger.js";

export type ErrorCode =
  | "BAD_REQUEST"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "VALIDATION_ERROR"
  | "ENGINE_UNAVAILABLE"
  | "ALREADY_CLAIMED"
  | "ALREADY_RESOLVED"
  | "CLAIM_NOT_HELD"
  | "CALIBRATION_FIXTURE_MISSING"
  | "AUDIT_FAILED"
  | "CANCELLED"
  | "INTERNAL_ERROR"
  | "SERVICE_UNAVAILABLE";

type HttpErrorStatus = 400 | 401 | 404 | 409 | 422 | 500 | 503;

export class AppError extends Error {
  code: ErrorCode;
  status: HttpErrorStatus;
  details?: unknown;

  constructor(opts: { code: ErrorCode; status: HttpErrorStatus; message: string; details?: unknown; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "AppError";
    this.code = opts.code;
    this.status = opts.status;
    this.details = opts.details;
  }
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
  return err instanceof AppError && (code === undefined || err.code === code);
}

export function badRequest(message: string, details?: unknown) {
  return new AppError({ code: "BAD_REQUEST", status: 400, message, details });
}

export function unauthorized(message = "Unauthorized") {
  return new AppError({ code: "UNAUTHORIZED", status: 401, message });
}

export function notFound(resource: string, id?: string) {
  return new AppError({
    code: "NOT_FOUND",
    status: 404,
    message: `${resource} not found`,
    details: id ? { resource, id } : { resource },
  });
}

export function conflict(message: string, details?: unknown) {
  return new AppError({ code: "CONFLICT", status: 409, message, details });
}

export function validationError(message = "Validation failed", details?: unknown) {
  return new AppError({ code: "VALIDATION_ERROR", status: 422, message, details });
}

/** A secondary engine timed out or crashed during cross-validation or calibration. */
export function engineUnavailable(engineId: string, cause?: unknown) {
  const reason = cause instanceof Error ? cause.message : cause === undefined ? "unavailable" : String(cause);
  return new AppError({
    code: "ENGINE_UNAVAILABLE",
    status: 503,
    message: `Engine '${engineId}' unavailable: ${reason}`,
    details: { engineId },
    cause,
  });
}

/** Also raised for a claim on a RESOLVED item; `status` then says so and `claimedBy` names the resolver. */
export function alreadyClaimed(
  itemId: string,
  details?: { status?: "CLAIMED" | "RESOLVED"; claimedBy: string | null; leaseExpiresAt: string | null }
) {
  return new AppError({
    code: "ALREADY_CLAIMED",
    status: 409,
    message: "Review item is already claimed",
    details: { id: itemId, ...details },
  });
}

export function alreadyResolved(itemId: string) {
  return new AppError({
    code: "ALREADY_RESOLVED",
    status: 409,
    message: "Review item is already resolved",
    details: { id: itemId },
  });
}

export function claimNotHeld(itemId: string, reviewerId: string) {
  return new AppError({
    code: "CLAIM_NOT_HELD",
    status: 409,
    message: "Reviewer does not hold the claim on this review item",
    details: { id: itemId, reviewerId },
  });
}

export function calibrationFixtureMissing(analyzerId: string) {
  return new AppError({
    code: "CALIBRATION_FIXTURE_MISSING",
    status: 404,
    message: `No calibration fixtures registered for analyzer '${analyzerId}'`,
    details: { analyzerId },
  });
}

/** With `committed`, the transition stands and `eventIds` names the events that were not delivered. */
export function auditFailed(cause: unknown, opts?: { committed: true; eventIds: string[] }) {
  if (opts) {
    return new AppError({
      code: "AUDIT_FAILED",
      status: 503,
      message: "Audit events could not be delivered; the state transition was committed",
      details: { committed: true, eventIds: opts.eventIds },
      cause,
    });
  }
  return new AppError({
    code: "AUDIT_FAILED",
    status: 503,
    message: "Audit sink rejected the event; state transition aborted",
    cause,
  });
}

export function cancelled(contentRef: string) {
  return new AppError({
    code: "CANCELLED",
    status: 409,
    message: "Submission cancelled: evidence was withdrawn",
    details: { contentRef },
  });
}

export function serviceUnavailable(message: string, details?: unknown) {
  return new AppError({ code: "SERVICE_UNAVAILABLE", status: 503, message, details });
}

/** Maps a zod failure onto the domain's ValidationError. */
export function fromZodError(err: ZodError, message = "Validation failed") {
  return validationError(message, err.issues);
}

export function toErrorResponse(c: Context, err: unknown): Response {
  const requestId = c.res.headers.get("x-request-id") ?? c.req.header("x-request-id") ?? undefined;

  if (err instanceof AppError) {
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
    const e = fromZodError(err);
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
