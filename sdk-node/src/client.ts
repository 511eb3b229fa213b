import type { File } from "formdata-node";

import { resolveClientConfig } from "./config.js";
import {
  ConvertError,
  type ConvertStage,
  UnknownServerError,
  ValidationError,
  toConversionToolsError,
} from "./errors.js";
import { FilesApi, toUploadFile } from "./files.js";
import { HttpClient } from "./http.js";
import { resolveLogger } from "./logger.js";
import { RetryPolicy } from "./retry.js";
import { ApiConfigResponseSchema, UserInfoResponseSchema } from "./schemas.js";
import type { Task } from "./task.js";
import { TasksApi } from "./tasks.js";
import type {
  ConversionInput,
  ConversionToolsClientOptions,
  ConvertParams,
  ConvertResult,
  CreateTaskOptions,
  RateLimitSnapshot,
  TaskOptions,
  TaskStatus,
  TaskSummary,
  UserInfo,
} from "./types.js";

/* ---------------------------------- Utils --------------------------------- */

type PreparedInput =
  | { kind: "file"; file: File }
  | { kind: "url"; url: string }
  | { kind: "fileId"; fileId: string };

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

async function prepareInput(input: ConversionInput): Promise<PreparedInput> {
  if (input === null || input === undefined) {
    throw new ValidationError({ message: "Input is required" });
  }

  if (typeof input === "object" && "url" in input) {
    if (!isHttpUrl(input.url)) {
      throw new ValidationError({ message: `Invalid URL: ${input.url}` });
    }
    return { kind: "url", url: input.url };
  }

  if (typeof input === "object" && "fileId" in input) {
    if (typeof input.fileId !== "string" || !input.fileId.trim()) {
      throw new ValidationError({ message: "File ID is required" });
    }
    return { kind: "fileId", fileId: input.fileId };
  }

  return { kind: "file", file: await toUploadFile(input) };
}

async function runStage<T>(
  stage: ConvertStage,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new ConvertError(stage, toConversionToolsError(err));
  }
}

/* --------------------------------- Client --------------------------------- */

/**
 * Node.js client for the Conversion Tools REST API.
 *
 * @example
 * ```typescript
 * const client = new ConversionTools({ apiToken: "your-api-token" });
 *
 * // Convert and write the result to disk
 * await client.convert({
 *   type: "convert.xml_to_csv",
 *   input: "./data.xml",
 *   output: "./data.csv",
 *   options: { delimiter: "comma" },
 * });
 *
 * // Fire and forget, completion is delivered to a webhook
 * const started = await client.convert({
 *   type: "convert.website_to_pdf",
 *   input: { url: "https://example.com" },
 *   wait: false,
 *   callbackUrl: "https://hooks.example.com/conversions",
 * });
 * ```
 * Authentication uses a bearer token.
 */
export class ConversionTools {
  readonly files: FilesApi;
  readonly tasks: TasksApi;

  private readonly http: HttpClient;

  constructor(opts: ConversionToolsClientOptions) {
    const config = resolveClientConfig(opts);
    const logger = resolveLogger(config);

    this.http = new HttpClient({
      apiToken: config.apiToken,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      userAgent: config.userAgent,
      retryPolicy: new RetryPolicy({
        maxAttempts: config.retries,
        baseDelayMs: config.retryDelayMs,
        maxDelayMs: config.maxRetryDelayMs,
      }),
      logger,
      dispatcher: config.dispatcher,
    });

    this.files = new FilesApi(this.http, {
      onUploadProgress: config.onUploadProgress,
      onDownloadProgress: config.onDownloadProgress,
    });

    this.tasks = new TasksApi(this.http, this.files, {
      pollingIntervalMs: config.pollingIntervalMs,
      maxPollingIntervalMs: config.maxPollingIntervalMs,
      pollingBackoff: config.pollingBackoff,
      waitTimeoutMs: config.waitTimeoutMs,
      rateLimitDuringWait: config.rateLimitDuringWait,
      onConversionProgress: config.onConversionProgress,
      webhookUrl: config.webhookUrl,
      sandbox: config.sandbox,
      logger,
    });
  }

  /**
   * Upload (unless the input is a URL or an uploaded file id), create the
   * task, wait for it and fetch the result: to `output` when given, as a
   * buffer otherwise. With `wait: false` the created task is returned as
   * soon as the service accepts it.
   *
   * @throws ConvertError tagged with the stage that failed; `cause` is the
   * underlying error.
   */
  async convert(params: ConvertParams): Promise<ConvertResult> {
    const { signal } = params;

    const input = await runStage("validate", async () => {
      if (typeof params.type !== "string" || !params.type.trim()) {
        throw new ValidationError({ message: "Conversion type is required" });
      }
      return prepareInput(params.input);
    });

    const taskOptions: TaskOptions = { ...params.options };

    if (input.kind === "file") {
      const handle = await runStage("upload", () =>
        this.files.uploadFile(input.file, { signal })
      );
      taskOptions.file_id = handle.id;
    } else if (input.kind === "fileId") {
      taskOptions.file_id = input.fileId;
    } else {
      taskOptions.url = input.url;
    }

    const task = await runStage("convert", () =>
      this.tasks.create(params.type, taskOptions, {
        callbackUrl: params.callbackUrl,
        sandbox: params.sandbox,
        signal,
      })
    );

    if (params.wait === false) {
      return { kind: "task", task };
    }

    await runStage("convert", () => task.wait({ ...params.polling, signal }));

    const output = params.output;
    if (output) {
      const path = await runStage("download", () =>
        task.downloadTo(output, { signal })
      );
      return { kind: "downloaded", path, task };
    }

    const buffer = await runStage("download", () =>
      task.downloadBytes({ signal })
    );
    return { kind: "buffer", buffer, task };
  }

  createTask(
    type: string,
    options?: TaskOptions,
    opts?: CreateTaskOptions
  ): Promise<Task> {
    return this.tasks.create(type, options, opts);
  }

  getTask(taskId: string, opts?: { signal?: AbortSignal }): Promise<Task> {
    return this.tasks.get(taskId, opts);
  }

  listTasks(
    status?: TaskStatus,
    opts?: { signal?: AbortSignal }
  ): Promise<TaskSummary[]> {
    return this.tasks.list(status, opts);
  }

  /** Quota counters from the most recent response that carried them. */
  getRateLimits(): RateLimitSnapshot | undefined {
    return this.http.getRateLimits();
  }

  async getUser(opts: { signal?: AbortSignal } = {}): Promise<UserInfo> {
    const res = await this.http.json(
      { method: "GET", path: "/auth", signal: opts.signal },
      UserInfoResponseSchema
    );

    if (res.error) {
      throw new ValidationError({ message: res.error, details: res });
    }
    if (!res.email) {
      throw new UnknownServerError({
        message: "User response is missing email",
        details: res,
      });
    }

    return { email: res.email };
  }

  getApiConfig(
    opts: { signal?: AbortSignal } = {}
  ): Promise<Record<string, unknown>> {
    return this.http.json(
      { method: "GET", path: "/config", signal: opts.signal },
      ApiConfigResponseSchema
    );
  }
}
