import type { Readable } from "node:stream";
import type { ReadableStream } from "node:stream/web";
import type { Dispatcher } from "undici";

import type { Logger } from "./logger.js";
import type { Task } from "./task.js";

export type TaskStatus = "PENDING" | "RUNNING" | "SUCCESS" | "ERROR";

/* -------------------------------- Progress -------------------------------- */

/**
 * `total` and `percent` are omitted when the size is not known up front
 * (downloads without a Content-Length).
 */
export type ProgressEvent = {
  loaded: number;
  total?: number;
  percent?: number;
};

export type ConversionProgressEvent = {
  taskId: string;
  status: TaskStatus;
  percent: number;
};

export interface ProgressObserver<E> {
  onProgress(event: E): void;
}

/* ------------------------------- Rate limits ------------------------------ */

export type RateLimitCounter = {
  limit: number;
  remaining: number;
};

export type RateLimitSnapshot = {
  daily?: RateLimitCounter;
  monthly?: RateLimitCounter;
  fileSize?: number;
};

/* --------------------------------- Client --------------------------------- */

export type RateLimitDuringWait = "retry" | "abort";

export type ConversionToolsClientOptions = {
  apiToken: string;
  baseUrl?: string; // default: https://api.conversiontools.io/v1
  timeoutMs?: number; // per request, default: 300000
  retries?: number; // max attempts per request, default: 3
  retryDelayMs?: number; // default: 1000
  maxRetryDelayMs?: number; // default: 30000
  pollingIntervalMs?: number; // default: 5000
  maxPollingIntervalMs?: number; // default: 30000
  pollingBackoff?: number; // default: 1.5
  waitTimeoutMs?: number; // 0 waits forever
  webhookUrl?: string;
  sandbox?: boolean;
  rateLimitDuringWait?: RateLimitDuringWait; // default: "retry"
  userAgent?: string;
  onUploadProgress?: ProgressObserver<ProgressEvent>;
  onDownloadProgress?: ProgressObserver<ProgressEvent>;
  onConversionProgress?: ProgressObserver<ConversionProgressEvent>;
  logger?: Logger;
  debug?: boolean;
  dispatcher?: Dispatcher;
};

/* --------------------------------- Inputs --------------------------------- */

export type UploadSource =
  | string
  | Uint8Array
  | Readable
  | ReadableStream<Uint8Array>
  | { path: string; fileName?: string }
  | { buffer: Uint8Array; fileName?: string }
  | { stream: Readable | ReadableStream<Uint8Array>; fileName?: string };

export type ConversionInput = UploadSource | { url: string } | { fileId: string };

export type UploadOptions = {
  fileName?: string;
  /** Never moves backwards, a retried attempt included. */
  onProgress?: ProgressObserver<ProgressEvent>;
  signal?: AbortSignal;
};

export type DownloadOptions = {
  onProgress?: ProgressObserver<ProgressEvent>;
  signal?: AbortSignal;
};

export type FileInfo = {
  name: string;
  size: number;
  preview?: boolean;
  previewData?: string[];
};

export type UserInfo = {
  email: string;
};

/* ---------------------------------- Tasks --------------------------------- */

export type TaskOptions = Record<string, unknown>;

export type CreateTaskOptions = {
  callbackUrl?: string;
  sandbox?: boolean;
  signal?: AbortSignal;
};

export type WaitOptions = {
  pollingIntervalMs?: number;
  maxPollingIntervalMs?: number;
  pollingBackoff?: number;
  timeoutMs?: number;
  onProgress?: ProgressObserver<ConversionProgressEvent>;
  signal?: AbortSignal;
};

export type TaskFileRef = {
  id: string;
  name: string;
  size: number;
  exists: boolean;
};

export type TaskSummary = {
  id: string;
  type: string;
  status: TaskStatus;
  error: string | null;
  url: string | null;
  dateCreated: string;
  dateFinished: string | null;
  conversionProgress: number;
  fileSource?: TaskFileRef;
  fileResult?: TaskFileRef;
};

/* --------------------------------- Convert -------------------------------- */

export type ConvertParams = {
  type: string;
  input: ConversionInput;
  options?: TaskOptions;
  /** Destination path; without it the result comes back as a buffer. */
  output?: string;
  wait?: boolean;
  callbackUrl?: string;
  sandbox?: boolean;
  polling?: Omit<WaitOptions, "onProgress" | "signal">;
  signal?: AbortSignal;
};

export type ConvertResult =
  | {
      kind: "task";
      task: Task;
    }
  | {
      kind: "downloaded";
      path: string;
      task: Task;
    }
  | {
      kind: "buffer";
      buffer: Buffer;
      task: Task;
    };
