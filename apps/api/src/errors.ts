/**
 * Standardized API error responses and the domain error taxonomy.
 *
 * Services throw `DomainError` subclasses; the app-level error handler maps
 * them onto `{ error, message, statusCode }` bodies with the extra context
 * each subclass carries.
 */
import { FastifyReply } from "fastify";
import type { DuplicateMatchType } from "@bursary/shared";
import type { z, ZodError, ZodTypeAny } from "zod";

export interface ApiError {
  error: string;
  message: string;
  statusCode: number;
  fieldErrors?: Record<string, string[]>;
  existingReference?: string;
  matchType?: DuplicateMatchType;
}

export function sendError(reply: FastifyReply, statusCode: number, error: string, message?: string): ApiError {
  const body: ApiError = { error, message: message || error, statusCode };
  reply.code(statusCode);
  return body;
}

export function send400(reply: FastifyReply, error: string, message?: string) {
  return sendError(reply, 400, error, message);
}

export abstract class DomainError extends Error {
  abstract readonly statusCode: number;

  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  toApiError(): ApiError {
    return { error: this.code, message: this.message, statusCode: this.statusCode };
  }
}

/** Malformed or missing input. Never retried. */
export class ValidationError extends DomainError {
  readonly statusCode = 400;

  constructor(
    message: string,
    readonly fieldErrors: Record<string, string[]> = {},
    code = "VALIDATION_FAILED"
  ) {
    super(code, message);
  }

  static fromZod(error: ZodError, message = "Request validation failed"): ValidationError {
    const fieldErrors: Record<string, string[]> = {};
    for (const issue of error.issues) {
      const key = issue.path.length > 0 ? issue.path.join(".") : "_root";
      (fieldErrors[key] ??= []).push(issue.message);
    }
    return new ValidationError(message, fieldErrors);
  }

  toApiError(): ApiError {
    return { ...super.toApiError(), fieldErrors: this.fieldErrors };
  }
}

/** An exact or strong duplicate exists; the same payload will always be refused. */
export class DuplicateBlockedError extends DomainError {
  readonly statusCode = 409;

  constructor(
    message: string,
    readonly existingReference: string,
    readonly matchType: DuplicateMatchType
  ) {
    super("DUPLICATE_APPLICATION", message);
  }

  toApiError(): ApiError {
    return { ...super.toApiError(), existingReference: this.existingReference, matchType: this.matchType };
  }
}

/** Ownership mismatch or missing privilege. */
export class AuthorizationError extends DomainError {
  readonly statusCode = 403;

  constructor(message: string, code = "FORBIDDEN") {
    super(code, message);
  }
}

/** Editability, deadline or terminal-status policy refused the operation. */
export class PolicyViolationError extends DomainError {
  readonly statusCode = 403;
}

export class NotFoundError extends DomainError {
  readonly statusCode = 404;

  constructor(message = "Application not found", code = "APPLICATION_NOT_FOUND") {
    super(code, message);
  }
}

/** A concurrent writer changed the record between read and write. */
export class ConflictError extends DomainError {
  readonly statusCode = 409;

  constructor(message: string, code = "CONCURRENT_MODIFICATION") {
    super(code, message);
  }
}

/**
 * Best-effort delivery failure. Recorded in delivery results and logs,
 * never thrown past the notification dispatcher.
 */
export class NotificationDeliveryError extends DomainError {
  readonly statusCode = 502;

  constructor(
    readonly channel: "email" | "sms",
    readonly recipient: string,
    message: string
  ) {
    super("NOTIFICATION_FAILED", message);
  }
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

export function sendDomainError(reply: FastifyReply, error: DomainError): ApiError {
  reply.code(error.statusCode);
  return error.toApiError();
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Parse with a Zod schema, raising `ValidationError` on failure. */
export function parseOrThrow<S extends ZodTypeAny>(schema: S, input: unknown, message?: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod(parsed.error, message);
  return parsed.data;
}
