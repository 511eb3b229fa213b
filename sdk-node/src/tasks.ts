import { UnknownServerError, ValidationError } from "./errors.js";
import type { FilesApi } from "./files.js";
import type { HttpClient } from "./http.js";
import {
  TaskCreateResponseSchema,
  TaskListResponseSchema,
  type TaskStatusResponse,
  TaskStatusResponseSchema,
} from "./schemas.js";
import { Task, type TaskDefaults } from "./task.js";
import type {
  CreateTaskOptions,
  TaskOptions,
  TaskStatus,
  TaskSummary,
} from "./types.js";

export type TasksApiDefaults = TaskDefaults & {
  webhookUrl?: string;
  sandbox: boolean;
};

function taskIdOf(taskId: string): string {
  if (typeof taskId !== "string" || !taskId.trim()) {
    throw new ValidationError({ message: "Task ID is required" });
  }
  return taskId;
}

/**
 * Creates, inspects and lists conversion tasks. The conversion type is only
 * checked for presence; the service owns the vocabulary.
 */
export class TasksApi {
  constructor(
    private readonly http: HttpClient,
    private readonly files: FilesApi,
    private readonly defaults: TasksApiDefaults
  ) {}

  async create(
    type: string,
    options: TaskOptions = {},
    opts: CreateTaskOptions = {}
  ): Promise<Task> {
    if (typeof type !== "string" || !type.trim()) {
      throw new ValidationError({ message: "Conversion type is required" });
    }

    const callbackUrl = opts.callbackUrl ?? this.defaults.webhookUrl;
    const sandbox = opts.sandbox ?? this.defaults.sandbox;
    const taskOptions: TaskOptions = sandbox
      ? { ...options, sandbox: true }
      : { ...options };

    const res = await this.http.json(
      {
        method: "POST",
        path: "/tasks",
        json: {
          type,
          options: taskOptions,
          ...(callbackUrl ? { callbackUrl } : {}),
        },
        signal: opts.signal,
      },
      TaskCreateResponseSchema
    );

    if (res.error) {
      throw new ValidationError({ message: res.error, details: res });
    }
    if (!res.task_id) {
      throw new UnknownServerError({
        message: "Task creation response is missing task_id",
        details: res,
      });
    }

    this.defaults.logger.debug("task created", {
      taskId: res.task_id,
      type,
      sandbox: res.sandbox ?? sandbox,
      message: res.message,
    });

    return this.build({ id: res.task_id, type, options: taskOptions });
  }

  async getStatus(
    taskId: string,
    opts: { signal?: AbortSignal; retryRateLimited?: boolean } = {}
  ): Promise<TaskStatusResponse> {
    const id = taskIdOf(taskId);

    return this.http.json(
      {
        method: "GET",
        path: `/tasks/${encodeURIComponent(id)}`,
        resource: "task",
        signal: opts.signal,
        retryRateLimited: opts.retryRateLimited,
      },
      TaskStatusResponseSchema
    );
  }

  /** Rebuilds a Task for an id created elsewhere (e.g. by a webhook flow). */
  async get(taskId: string, opts: { signal?: AbortSignal } = {}): Promise<Task> {
    const id = taskIdOf(taskId);
    const task = this.build({ id, type: "" });
    return task.refresh(opts);
  }

  /** Summaries in the order the server returns them. */
  async list(
    status?: TaskStatus,
    opts: { signal?: AbortSignal } = {}
  ): Promise<TaskSummary[]> {
    const res = await this.http.json(
      {
        method: "GET",
        path: "/tasks",
        query: { status },
        signal: opts.signal,
      },
      TaskListResponseSchema
    );

    if (res.error) {
      throw new ValidationError({ message: res.error, details: res });
    }

    return res.data;
  }

  private build(init: { id: string; type: string; options?: TaskOptions }) {
    return new Task(init, this, this.files, this.defaults);
  }
}
