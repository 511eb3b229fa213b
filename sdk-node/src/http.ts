import { fetch, type Dispatcher, type Response } from "undici";
import type { BodyInit } from "undici";
import type { z } from "zod";

import { formatIssues } from "./config.js";
import {
  AuthenticationError,
  ConversionToolsError,
  NotFoundError,
  type NotFoundResource,
  RateLimitError,
  RequestAbortedError,
  ServerError,
  TransportError,
  UnknownServerError,
  ValidationError,
  toConversionToolsError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { RetryPolicy, withRetry } from "./retry.js";
import type { RateLimitCounter, RateLimitSnapshot } from "./types.js";
import { mergeAbortSignals, parseRetryAfterMs } from "./utils.js";

/* ---------------------------------- Types --------------------------------- */

export type HttpMethod = "GET" | "POST";

export type PreparedBody = {
  body: BodyInit;
  headers?: Record<string, string>;
  /** Required by fetch for streamed request bodies. */
  duplex?: "half";
};

export type HttpRequest = {
  method: HttpMethod;
  path: string;
  query?: Record<string, string | undefined>;
  json?: unknown;
  /** Called once per attempt so a consumed body can be rebuilt for a retry. */
  body?: () => PreparedBody | Promise<PreparedBody>;
  signal?: AbortSignal;
  /** What a 404 refers to. */
  resource?: NotFoundResource;
  /** Overrides the policy's handling of non-hard 429s for this call. */
  retryRateLimited?: boolean;
};

export type HttpClientOptions = {
  apiToken: string;
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  retryPolicy: RetryPolicy;
  logger: Logger;
  dispatcher?: Dispatcher;
};

type JsonObject = Record<string, unknown>;

/* ---------------------------------- Utils --------------------------------- */

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
]);

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getRequestId(res: Response): string | undefined {
  return (
    res.headers.get("x-request-id") ?? res.headers.get("cf-ray") ?? undefined
  );
}

function readCounter(
  headers: Response["headers"],
  limitHeader: string,
  remainingHeader: string
): RateLimitCounter | undefined {
  const limit = Number.parseInt(headers.get(limitHeader) ?? "", 10);
  const remaining = Number.parseInt(headers.get(remainingHeader) ?? "", 10);
  if (!Number.isFinite(limit) || !Number.isFinite(remaining)) return undefined;
  return { limit, remaining };
}

export function parseRateLimits(
  headers: Response["headers"]
): RateLimitSnapshot | undefined {
  const snapshot: RateLimitSnapshot = {};

  const daily = readCounter(
    headers,
    "x-ratelimit-limit-tasks",
    "x-ratelimit-limit-tasks-remaining"
  );
  if (daily) snapshot.daily = daily;

  const monthly = readCounter(
    headers,
    "x-ratelimit-limit-tasks-monthly",
    "x-ratelimit-limit-tasks-monthly-remaining"
  );
  if (monthly) snapshot.monthly = monthly;

  const fileSize = Number.parseInt(
    headers.get("x-ratelimit-limit-filesize") ?? "",
    10
  );
  if (Number.isFinite(fileSize)) snapshot.fileSize = fileSize;

  return Object.keys(snapshot).length > 0 ? snapshot : undefined;
}

function isQuotaExhausted(limits?: RateLimitSnapshot): boolean {
  return limits?.daily?.remaining === 0 || limits?.monthly?.remaining === 0;
}

async function readErrorBody(res: Response): Promise<unknown> {
  let text: string;
  try {
    text = await res.text();
  } catch {
    return undefined;
  }
  if (!text) return undefined;

  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function errorMessage(body: unknown, status: number): string {
  if (isJsonObject(body)) {
    for (const key of ["message", "error", "error_description"]) {
      const value = body[key];
      if (typeof value === "string" && value.trim()) return value;
    }
  }
  return `Request failed with status ${status}`;
}

/**
 * Maps a non-2xx response onto the error taxonomy. Anything not listed here
 * becomes an UnknownServerError carrying the raw body.
 *
 * `limits` are the counters on this response and decide whether a 429 is
 * hard; a RateLimitError carries `snapshot` when given, `limits` otherwise.
 */
export async function classifyResponse(
  res: Response,
  resource: NotFoundResource,
  limits?: RateLimitSnapshot,
  snapshot: RateLimitSnapshot | undefined = limits
): Promise<ConversionToolsError> {
  const requestId = getRequestId(res);
  const details = await readErrorBody(res);
  const message = errorMessage(details, res.status);
  const base = { message, status: res.status, requestId, details };

  switch (res.status) {
    case 400:
    case 422:
      return new ValidationError(base);
    case 401:
    case 403:
      return new AuthenticationError(base);
    case 404:
      return new NotFoundError({ ...base, resource });
    case 408:
      return new TransportError({ ...base, reason: "timeout" });
    case 429:
      return new RateLimitError({
        ...base,
        limits: snapshot,
        hard: isQuotaExhausted(limits),
        retryAfterMs: parseRetryAfterMs(res.headers.get("retry-after")),
      });
  }

  if (res.status >= 500 && res.status <= 599) {
    return new ServerError(base);
  }

  return new UnknownServerError(base);
}

function errorCode(err: unknown): string | undefined {
  if (isJsonObject(err) || err instanceof Error) {
    const code = "code" in err ? err.code : undefined;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

// undici reports socket failures as `TypeError: fetch failed` (request) or
// `TypeError: terminated` (body), with the socket error as `cause`.
function isNetworkFailure(err: unknown): boolean {
  if (
    err instanceof TypeError &&
    (err.message === "fetch failed" || err.message === "terminated")
  ) {
    return true;
  }

  const codes = [errorCode(err)];
  if (err instanceof Error) codes.push(errorCode(err.cause));

  return codes.some(
    (code) =>
      code !== undefined &&
      (code.startsWith("UND_ERR") || NETWORK_ERROR_CODES.has(code))
  );
}

export function normalizeError(
  err: unknown,
  state: { aborted: boolean; timedOut: boolean; timeoutMs: number }
): ConversionToolsError {
  if (err instanceof ConversionToolsError) return err;

  if (state.aborted) return new RequestAbortedError();

  if (state.timedOut) {
    return new TransportError({
      message: `Request timed out after ${state.timeoutMs}ms`,
      reason: "timeout",
      cause: err,
    });
  }

  if (isNetworkFailure(err)) {
    const cause = err instanceof Error ? err.cause : undefined;
    const detail =
      cause instanceof Error && cause.message ? `: ${cause.message}` : "";
    return new TransportError({
      message: `Network request failed${detail}`,
      reason: "network",
      cause: err,
    });
  }

  return toConversionToolsError(err);
}

/**
 * Reads a JSON body and validates it. A non-JSON body or an unexpected shape
 * is an UnknownServerError, never coerced into a known kind.
 */
export async function parseJson<T>(
  res: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const requestId = getRequestId(res);
  const text = await res.text();

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new UnknownServerError({
      message: "Response body is not valid JSON",
      status: res.status,
      requestId,
      details: text,
    });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new UnknownServerError({
      message: `Unexpected response shape: ${formatIssues(parsed.error.issues)}`,
      status: res.status,
      requestId,
      details: body,
    });
  }

  return parsed.data;
}

/* --------------------------------- Client --------------------------------- */

/**
 * Authenticated transport shared by the files and tasks APIs. Every call goes
 * through the retry policy; the last rate-limit headers seen are kept as a
 * snapshot (last write wins across concurrent calls).
 */
export class HttpClient {
  private readonly apiToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;
  private readonly dispatcher?: Dispatcher;
  private rateLimits?: RateLimitSnapshot;

  constructor(opts: HttpClientOptions) {
    this.apiToken = opts.apiToken;
    this.baseUrl = opts.baseUrl;
    this.timeoutMs = opts.timeoutMs;
    this.userAgent = opts.userAgent;
    this.retryPolicy = opts.retryPolicy;
    this.logger = opts.logger;
    this.dispatcher = opts.dispatcher;
  }

  getRateLimits(): RateLimitSnapshot | undefined {
    return this.rateLimits;
  }

  /**
   * Runs the request with retries. `consume` reads the successful response
   * inside the attempt, so a body that fails mid-stream is retried as well.
   */
  send<T>(
    req: HttpRequest,
    consume: (res: Response) => Promise<T>
  ): Promise<T> {
    const policy =
      req.retryRateLimited === undefined
        ? this.retryPolicy
        : this.retryPolicy.with({ retryRateLimited: req.retryRateLimited });

    return withRetry((attempt) => this.attempt(req, attempt, consume), policy, {
      signal: req.signal,
      logger: this.logger,
      label: `${req.method} ${req.path}`,
    });
  }

  json<T>(
    req: HttpRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    return this.send(req, (res) => parseJson(res, schema));
  }

  /* ------------------------------ Internals ------------------------------ */

  private buildUrl(req: HttpRequest): string {
    const url = `${this.baseUrl}${req.path}`;
    if (!req.query) return url;

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(req.query)) {
      if (value !== undefined) params.set(key, value);
    }
    const qs = params.toString();
    return qs ? `${url}?${qs}` : url;
  }

  private async prepareBody(req: HttpRequest): Promise<PreparedBody | undefined> {
    if (req.body) return req.body();
    if (req.json === undefined) return undefined;

    return {
      body: JSON.stringify(req.json),
      headers: { "content-type": "application/json" },
    };
  }

  private async attempt<T>(
    req: HttpRequest,
    attempt: number,
    consume: (res: Response) => Promise<T>
  ): Promise<T> {
    const timeoutCtrl = new AbortController();
    const timeoutId = setTimeout(() => timeoutCtrl.abort(), this.timeoutMs);

    const merged = mergeAbortSignals(req.signal, timeoutCtrl.signal);

    try {
      if (req.signal?.aborted) throw new RequestAbortedError();

      const prepared = await this.prepareBody(req);

      this.logger.debug("request", {
        method: req.method,
        path: req.path,
        attempt,
      });

      const res = await fetch(this.buildUrl(req), {
        method: req.method,
        body: prepared?.body,
        headers: {
          ...prepared?.headers,
          authorization: `Bearer ${this.apiToken}`,
          "user-agent": this.userAgent,
        },
        signal: merged.signal,
        dispatcher: this.dispatcher,
        ...(prepared?.duplex ? { duplex: prepared.duplex } : {}),
      });

      const limits = parseRateLimits(res.headers);
      if (limits) this.rateLimits = limits;

      this.logger.debug("response", {
        method: req.method,
        path: req.path,
        status: res.status,
      });

      if (!res.ok) {
        throw await classifyResponse(
          res,
          req.resource ?? "unknown",
          limits,
          this.rateLimits
        );
      }

      return await consume(res);
    } catch (err) {
      throw normalizeError(err, {
        aborted: req.signal?.aborted ?? false,
        timedOut: timeoutCtrl.signal.aborted,
        timeoutMs: this.timeoutMs,
      });
    } finally {
      clearTimeout(timeoutId);
      merged.cleanup();
    }
  }
}
