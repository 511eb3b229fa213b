import { z } from "zod";
import type { Dispatcher } from "undici";

import { ValidationError } from "./errors.js";
import type { Logger } from "./logger.js";
import type {
  ConversionProgressEvent,
  ProgressEvent,
  ProgressObserver,
} from "./types.js";

/* -------------------------------- Constants ------------------------------- */

export const SDK_VERSION = "1.0.0";

export const DEFAULT_BASE_URL = "https://api.conversiontools.io/v1";
export const DEFAULT_TIMEOUT_MS = 300_000;
export const DEFAULT_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 1_000;
export const DEFAULT_MAX_RETRY_DELAY_MS = 30_000;
export const DEFAULT_POLLING_INTERVAL_MS = 5_000;
export const DEFAULT_MAX_POLLING_INTERVAL_MS = 30_000;
export const DEFAULT_POLLING_BACKOFF = 1.5;
export const DEFAULT_USER_AGENT = `conversiontools-node/${SDK_VERSION}`;

/* --------------------------------- Schemas -------------------------------- */

function observer<E>() {
  return z.custom<ProgressObserver<E>>(
    (value) =>
      typeof value === "object" &&
      value !== null &&
      "onProgress" in value &&
      typeof value.onProgress === "function",
    { message: "Expected an object with an onProgress(event) method" }
  );
}

const loggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "debug" in value &&
    "warn" in value &&
    typeof value.debug === "function" &&
    typeof value.warn === "function",
  { message: "Expected a logger with debug() and warn() methods" }
);

const dispatcherSchema = z.custom<Dispatcher>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "dispatch" in value &&
    typeof value.dispatch === "function",
  { message: "Expected an undici Dispatcher" }
);

function normalizeBaseUrl(baseUrl: string): string {
  const url = baseUrl.trim();
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

/** Largest delay setTimeout honours; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

const delayMs = () => z.number().finite().max(MAX_TIMER_MS);

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: "Expected an http(s) URL",
  });

/**
 * Every recognised client option with its default. The object is strict:
 * an unknown key is a ValidationError rather than being ignored, so typos
 * such as `pollingInterval` surface at construction.
 */
export const ClientOptionsSchema = z
  .object({
    apiToken: z
      .string({ required_error: "apiToken is required" })
      .trim()
      .min(1, "apiToken is required"),
    baseUrl: httpUrl.default(DEFAULT_BASE_URL).transform(normalizeBaseUrl),
    timeoutMs: delayMs().positive().default(DEFAULT_TIMEOUT_MS),
    retries: z.number().int().min(1).default(DEFAULT_RETRIES),
    retryDelayMs: delayMs().min(0).default(DEFAULT_RETRY_DELAY_MS),
    maxRetryDelayMs: delayMs().min(0).default(DEFAULT_MAX_RETRY_DELAY_MS),
    pollingIntervalMs: delayMs().positive().default(DEFAULT_POLLING_INTERVAL_MS),
    maxPollingIntervalMs: delayMs()
      .positive()
      .default(DEFAULT_MAX_POLLING_INTERVAL_MS),
    pollingBackoff: z.number().finite().min(1).default(DEFAULT_POLLING_BACKOFF),
    waitTimeoutMs: delayMs().min(0).default(0),
    webhookUrl: httpUrl.optional(),
    sandbox: z.boolean().default(false),
    rateLimitDuringWait: z.enum(["retry", "abort"]).default("retry"),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
    onUploadProgress: observer<ProgressEvent>().optional(),
    onDownloadProgress: observer<ProgressEvent>().optional(),
    onConversionProgress: observer<ConversionProgressEvent>().optional(),
    logger: loggerSchema.optional(),
    debug: z.boolean().optional(),
    dispatcher: dispatcherSchema.optional(),
  })
  .strict()
  .refine((opts) => opts.maxPollingIntervalMs >= opts.pollingIntervalMs, {
    message: "maxPollingIntervalMs must be >= pollingIntervalMs",
    path: ["maxPollingIntervalMs"],
  })
  .refine((opts) => opts.maxRetryDelayMs >= opts.retryDelayMs, {
    message: "maxRetryDelayMs must be >= retryDelayMs",
    path: ["maxRetryDelayMs"],
  });

export type ResolvedClientConfig = z.output<typeof ClientOptionsSchema>;

/* --------------------------------- Resolve -------------------------------- */

export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}

export function resolveClientConfig(input: unknown): ResolvedClientConfig {
  const parsed = ClientOptionsSchema.safeParse(input);

  if (!parsed.success) {
    throw new ValidationError({
      message: `Invalid client options: ${formatIssues(parsed.error.issues)}`,
      details: parsed.error.issues,
    });
  }

  return parsed.data;
}
