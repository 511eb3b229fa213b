import { MAX_TIMER_MS } from "./config.js";
import {
  ConversionError,
  UnknownServerError,
  ValidationError,
  WaitTimeoutError,
} from "./errors.js";
import type { FileHandle, FilesApi } from "./files.js";
import type { Logger } from "./logger.js";
import type { TaskStatusResponse } from "./schemas.js";
import type { TasksApi } from "./tasks.js";
import type {
  ConversionProgressEvent,
  DownloadOptions,
  ProgressObserver,
  RateLimitDuringWait,
  TaskOptions,
  TaskStatus,
  WaitOptions,
} from "./types.js";
import { mergeAbortSignals, sleep } from "./utils.js";

const STATUS_RANK: Record<TaskStatus, number> = {
  PENDING: 0,
  RUNNING: 1,
  SUCCESS: 2,
  ERROR: 2,
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === "SUCCESS" || status === "ERROR";
}

/** Next polling interval: grows by `backoff`, never past `max`, never shrinks. */
export function nextPollingInterval(
  current: number,
  backoff: number,
  max: number
): number {
  return Math.max(current, Math.min(current * backoff, max));
}

export type TaskDefaults = {
  pollingIntervalMs: number;
  maxPollingIntervalMs: number;
  pollingBackoff: number;
  waitTimeoutMs: number;
  rateLimitDuringWait: RateLimitDuringWait;
  onConversionProgress?: ProgressObserver<ConversionProgressEvent>;
  logger: Logger;
};

export type TaskInit = {
  id: string;
  type: string;
  options?: TaskOptions;
  status?: TaskStatus;
  fileId?: string;
  error?: string;
  conversionProgress?: number;
};

/**
 * Client-side view of a conversion task. State only changes through
 * `refresh()`/`wait()`, i.e. from server responses, and only forward along
 * PENDING -> RUNNING -> SUCCESS | ERROR.
 *
 * @example
 * ```typescript
 * const task = await client.createTask("convert.xml_to_csv", { file_id: handle.id });
 * await task.wait({ onProgress: { onProgress: (e) => console.log(e.percent) } });
 * const csv = await task.downloadBytes();
 * ```
 */
export class Task {
  readonly id: string;
  readonly type: string;
  readonly options: TaskOptions;

  private _status: TaskStatus;
  private _fileId?: string;
  private _error?: string;
  private _conversionProgress: number;

  constructor(
    init: TaskInit,
    private readonly tasks: TasksApi,
    private readonly files: FilesApi,
    private readonly defaults: TaskDefaults
  ) {
    this.id = init.id;
    this.type = init.type;
    this.options = init.options ?? {};
    this._status = init.status ?? "PENDING";
    this._fileId = init.fileId;
    this._error = init.error;
    this._conversionProgress = init.conversionProgress ?? 0;
  }

  get status(): TaskStatus {
    return this._status;
  }

  /** Result file id, set once the task succeeded. */
  get fileId(): string | undefined {
    return this._fileId;
  }

  /** Server-provided failure message, set once the task failed. */
  get error(): string | undefined {
    return this._error;
  }

  get conversionProgress(): number {
    return this._conversionProgress;
  }

  get isComplete(): boolean {
    return isTerminalStatus(this._status);
  }

  get isSuccess(): boolean {
    return this._status === "SUCCESS";
  }

  get isError(): boolean {
    return this._status === "ERROR";
  }

  get isRunning(): boolean {
    return !this.isComplete;
  }

  async refresh(
    opts: { signal?: AbortSignal; retryRateLimited?: boolean } = {}
  ): Promise<this> {
    const res = await this.tasks.getStatus(this.id, opts);
    this.apply(res);
    return this;
  }

  /**
   * Polls until the task reaches SUCCESS or ERROR. The interval starts at
   * `pollingIntervalMs` and grows by `pollingBackoff` up to
   * `maxPollingIntervalMs`. The observer sees every poll, the first and the
   * terminal one included.
   *
   * @throws ConversionError when the task ends in ERROR.
   * @throws WaitTimeoutError once `timeoutMs` (when > 0) has elapsed; the
   * task keeps its last observed state and can be waited on again.
   * @throws RequestAbortedError when `signal` fires.
   */
  async wait(opts: WaitOptions = {}): Promise<this> {
    const initialInterval =
      opts.pollingIntervalMs ?? this.defaults.pollingIntervalMs;
    const maxInterval = Math.max(
      initialInterval,
      opts.maxPollingIntervalMs ?? this.defaults.maxPollingIntervalMs
    );
    const backoff = Math.max(
      1,
      opts.pollingBackoff ?? this.defaults.pollingBackoff
    );
    const timeoutMs = opts.timeoutMs ?? this.defaults.waitTimeoutMs;
    const observer = opts.onProgress ?? this.defaults.onConversionProgress;
    const retryRateLimited = this.defaults.rateLimitDuringWait === "retry";
    const logger = this.defaults.logger;

    const startedAt = performance.now();
    let intervalMs = initialInterval;

    const timedOut = () =>
      new WaitTimeoutError({
        message: `Task ${this.id} did not complete within ${timeoutMs}ms`,
        taskId: this.id,
        timeoutMs,
      });

    // a poll in flight when the deadline passes is aborted with it
    const deadline = timeoutMs > 0 ? new AbortController() : undefined;
    const deadlineTimer = deadline
      ? setTimeout(() => deadline.abort(), Math.min(timeoutMs, MAX_TIMER_MS))
      : undefined;
    const merged = mergeAbortSignals(opts.signal, deadline?.signal);

    try {
      for (;;) {
        await this.refresh({ signal: merged.signal, retryRateLimited });

        observer?.onProgress({
          taskId: this.id,
          status: this._status,
          percent: this._conversionProgress,
        });

        if (this.isComplete) break;

        let delayMs = intervalMs;
        if (timeoutMs > 0) {
          const remainingMs = timeoutMs - (performance.now() - startedAt);
          if (remainingMs <= 0) throw timedOut();
          delayMs = Math.min(delayMs, remainingMs);
        }

        logger.debug("task not complete, polling again", {
          taskId: this.id,
          status: this._status,
          intervalMs,
          delayMs,
        });

        await sleep(delayMs, merged.signal);
        intervalMs = nextPollingInterval(intervalMs, backoff, maxInterval);
      }
    } catch (err) {
      if (deadline?.signal.aborted && !opts.signal?.aborted) {
        throw timedOut();
      }
      throw err;
    } finally {
      clearTimeout(deadlineTimer);
      merged.cleanup();
    }

    if (this._status === "ERROR") {
      throw new ConversionError({
        message: this._error ?? "Conversion failed",
        taskId: this.id,
        taskError: this._error,
      });
    }

    return this;
  }

  resultFile(): FileHandle {
    if (!this._fileId) {
      throw new ValidationError({
        message: `Task ${this.id} has no result file (status ${this._status})`,
      });
    }
    return this.files.handle(this._fileId);
  }

  async downloadBytes(opts: DownloadOptions = {}): Promise<Buffer> {
    return this.files.downloadBytes(this.resultFile(), opts);
  }

  async downloadTo(
    destination?: string,
    opts: DownloadOptions = {}
  ): Promise<string> {
    return this.files.downloadTo(this.resultFile(), destination, opts);
  }

  toJSON() {
    return {
      id: this.id,
      type: this.type,
      status: this._status,
      fileId: this._fileId ?? null,
      error: this._error ?? null,
      conversionProgress: this._conversionProgress,
    };
  }

  /* ------------------------------ Internals ------------------------------ */

  private apply(res: TaskStatusResponse): void {
    const regressed =
      STATUS_RANK[res.status] < STATUS_RANK[this._status] ||
      (this.isComplete && res.status !== this._status);

    if (regressed) {
      throw new UnknownServerError({
        message: `Task ${this.id} reported ${res.status} after ${this._status}`,
        details: res,
      });
    }

    if (res.status === "SUCCESS" && !res.file_id) {
      throw new UnknownServerError({
        message: `Task ${this.id} succeeded without a result file id`,
        details: res,
      });
    }

    this._status = res.status;
    this._fileId = res.status === "SUCCESS" ? res.file_id ?? undefined : undefined;
    this._error = res.status === "ERROR" ? res.error ?? undefined : undefined;
    this._conversionProgress =
      res.status === "SUCCESS"
        ? 100
        : Math.max(this._conversionProgress, res.conversionProgress ?? 0);
  }
}
