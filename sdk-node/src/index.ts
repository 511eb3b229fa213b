export { ConversionTools } from "./client.js";
export {
  DEFAULT_BASE_URL,
  DEFAULT_MAX_POLLING_INTERVAL_MS,
  DEFAULT_MAX_RETRY_DELAY_MS,
  DEFAULT_POLLING_BACKOFF,
  DEFAULT_POLLING_INTERVAL_MS,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  SDK_VERSION,
} from "./config.js";
export {
  AuthenticationError,
  ConversionError,
  ConversionToolsError,
  ConvertError,
  NotFoundError,
  RateLimitError,
  RequestAbortedError,
  RetryExhaustedError,
  ServerError,
  TransportError,
  UnknownServerError,
  ValidationError,
  WaitTimeoutError,
} from "./errors.js";
export type {
  ConversionToolsErrorCode,
  ConvertStage,
  NotFoundResource,
  TransportFailure,
} from "./errors.js";
export { FileHandle, FilesApi } from "./files.js";
export type { FileRef } from "./files.js";
export { consoleLogger, silentLogger } from "./logger.js";
export type { LogContext, Logger } from "./logger.js";
export { RetryPolicy, withRetry } from "./retry.js";
export type { RetryDecision, RetryPolicyOptions } from "./retry.js";
export { Task, isTerminalStatus, nextPollingInterval } from "./task.js";
export { TasksApi } from "./tasks.js";
export type {
  ConversionInput,
  ConversionProgressEvent,
  ConversionToolsClientOptions,
  ConvertParams,
  ConvertResult,
  CreateTaskOptions,
  DownloadOptions,
  FileInfo,
  ProgressEvent,
  ProgressObserver,
  RateLimitCounter,
  RateLimitDuringWait,
  RateLimitSnapshot,
  TaskFileRef,
  TaskOptions,
  TaskStatus,
  TaskSummary,
  UploadOptions,
  UploadSource,
  UserInfo,
  WaitOptions,
} from "./types.js";
