import type { RateLimitSnapshot } from "./types.js";

export type ConversionToolsErrorCode =
  | "VALIDATION_ERROR"
  | "AUTHENTICATION_ERROR"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "CONVERSION_ERROR"
  | "WAIT_TIMEOUT"
  | "TRANSPORT_ERROR"
  | "SERVER_ERROR"
  | "RETRY_EXHAUSTED"
  | "ABORTED"
  | "UNKNOWN";

type BaseArgs = {
  message: string;
  status?: number;
  requestId?: string;
  details?: unknown;
  cause?: unknown;
};

export class ConversionToolsError extends Error {
  public readonly code: ConversionToolsErrorCode;
  public readonly status?: number;
  public readonly requestId?: string;
  public readonly details?: unknown;

  constructor(args: BaseArgs & { code: ConversionToolsErrorCode }) {
    super(
      args.message,
      args.cause === undefined ? undefined : { cause: args.cause }
    );
    this.name = "ConversionToolsError";
    this.code = args.code;
    this.status = args.status;
    this.requestId = args.requestId;
    this.details = args.details;
  }
}

/** Bad input, caught locally before any request or rejected by the server. */
export class ValidationError extends ConversionToolsError {
  constructor(args: BaseArgs) {
    super({ ...args, code: "VALIDATION_ERROR" });
    this.name = "ValidationError";
  }
}

export class AuthenticationError extends ConversionToolsError {
  constructor(args: BaseArgs) {
    super({ ...args, code: "AUTHENTICATION_ERROR" });
    this.name = "AuthenticationError";
  }
}

export type NotFoundResource = "file" | "task" | "unknown";

export class NotFoundError extends ConversionToolsError {
  public readonly resource: NotFoundResource;

  constructor(args: BaseArgs & { resource: NotFoundResource }) {
    super({ ...args, code: "NOT_FOUND" });
    this.name = "NotFoundError";
    this.resource = args.resource;
  }
}

/**
 * Quota exhausted. `hard` marks a daily or monthly ceiling that no amount of
 * waiting inside one call will lift; those are never retried.
 */
export class RateLimitError extends ConversionToolsError {
  public readonly limits?: RateLimitSnapshot;
  public readonly hard: boolean;
  public readonly retryAfterMs?: number;

  constructor(
    args: BaseArgs & {
      limits?: RateLimitSnapshot;
      hard: boolean;
      retryAfterMs?: number;
    }
  ) {
    super({ ...args, code: "RATE_LIMITED" });
    this.name = "RateLimitError";
    this.limits = args.limits;
    this.hard = args.hard;
    this.retryAfterMs = args.retryAfterMs;
  }
}

/** The task finished with status ERROR. */
export class ConversionError extends ConversionToolsError {
  public readonly taskId: string;
  public readonly taskError?: string;

  constructor(args: BaseArgs & { taskId: string; taskError?: string }) {
    super({ ...args, code: "CONVERSION_ERROR" });
    this.name = "ConversionError";
    this.taskId = args.taskId;
    this.taskError = args.taskError;
  }
}

export class WaitTimeoutError extends ConversionToolsError {
  public readonly taskId: string;
  public readonly timeoutMs: number;

  constructor(args: BaseArgs & { taskId: string; timeoutMs: number }) {
    super({ ...args, code: "WAIT_TIMEOUT" });
    this.name = "WaitTimeoutError";
    this.taskId = args.taskId;
    this.timeoutMs = args.timeoutMs;
  }
}

export type TransportFailure = "network" | "timeout";

export class TransportError extends ConversionToolsError {
  public readonly reason: TransportFailure;

  constructor(args: BaseArgs & { reason: TransportFailure }) {
    super({ ...args, code: "TRANSPORT_ERROR" });
    this.name = "TransportError";
    this.reason = args.reason;
  }
}

export class ServerError extends ConversionToolsError {
  constructor(args: BaseArgs) {
    super({ ...args, code: "SERVER_ERROR" });
    this.name = "ServerError";
  }
}

/** A response outside the recognised taxonomy; `details` keeps the raw body. */
export class UnknownServerError extends ConversionToolsError {
  constructor(args: BaseArgs) {
    super({ ...args, code: "UNKNOWN" });
    this.name = "UnknownServerError";
  }
}

export class RequestAbortedError extends ConversionToolsError {
  constructor(message = "Request aborted") {
    super({ message, code: "ABORTED" });
    this.name = "RequestAbortedError";
  }
}

export class RetryExhaustedError extends ConversionToolsError {
  public readonly attempts: number;
  public readonly elapsedMs: number;
  declare readonly cause: ConversionToolsError;

  constructor(args: {
    attempts: number;
    elapsedMs: number;
    lastError: ConversionToolsError;
  }) {
    super({
      message: `Gave up after ${args.attempts} attempt(s): ${args.lastError.message}`,
      code: "RETRY_EXHAUSTED",
      status: args.lastError.status,
      requestId: args.lastError.requestId,
      cause: args.lastError,
    });
    this.name = "RetryExhaustedError";
    this.attempts = args.attempts;
    this.elapsedMs = args.elapsedMs;
  }
}

export type ConvertStage = "validate" | "upload" | "convert" | "download";

/**
 * Thrown by `convert()`. `stage` names the step that failed, `code` and
 * `cause` keep the underlying error kind.
 */
export class ConvertError extends ConversionToolsError {
  public readonly stage: ConvertStage;
  declare readonly cause: ConversionToolsError;

  constructor(stage: ConvertStage, cause: ConversionToolsError) {
    super({
      message: `${stage} failed: ${cause.message}`,
      code: cause.code,
      status: cause.status,
      requestId: cause.requestId,
      details: cause.details,
      cause,
    });
    this.name = "ConvertError";
    this.stage = stage;
  }
}

/** Passes taxonomy errors through and wraps anything else as UNKNOWN. */
export function toConversionToolsError(err: unknown): ConversionToolsError {
  if (err instanceof ConversionToolsError) return err;

  if (err instanceof Error) {
    return new ConversionToolsError({
      message: err.message,
      code: "UNKNOWN",
      details: { name: err.name },
      cause: err,
    });
  }

  return new ConversionToolsError({
    message: "Unknown error",
    code: "UNKNOWN",
    details: err,
  });
}
