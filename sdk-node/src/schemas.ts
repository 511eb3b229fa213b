import { z } from "zod";

import type { FileInfo, TaskSummary } from "./types.js";

/*
 * Wire shapes. Fields the server may omit or send as null are normalised
 * here so the rest of the SDK deals in plain optional values.
 */

export const TaskStatusSchema = z.enum(["PENDING", "RUNNING", "SUCCESS", "ERROR"]);

const apiError = z.string().nullish();

export const FileUploadResponseSchema = z.object({
  error: apiError,
  file_id: z.string().min(1).optional(),
});

export const FileInfoSchema: z.ZodType<FileInfo, z.ZodTypeDef, unknown> =
  z.object({
    name: z.string(),
    size: z.number().nonnegative(),
    preview: z.boolean().optional(),
    previewData: z.array(z.string()).optional(),
  });

export const TaskCreateResponseSchema = z.object({
  error: apiError,
  task_id: z.string().min(1).optional(),
  sandbox: z.boolean().optional(),
  message: z.string().optional(),
});

export const TaskStatusResponseSchema = z.object({
  error: z.string().nullish(),
  status: TaskStatusSchema,
  file_id: z.string().nullish(),
  conversionProgress: z.number().min(0).max(100).nullish(),
});

export type TaskStatusResponse = z.output<typeof TaskStatusResponseSchema>;

const TaskFileRefSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.number(),
  exists: z.boolean(),
});

export const TaskSummarySchema: z.ZodType<TaskSummary, z.ZodTypeDef, unknown> =
  z.object({
    id: z.string(),
    type: z.string(),
    status: TaskStatusSchema,
    error: z.string().nullable().default(null),
    url: z.string().nullable().default(null),
    dateCreated: z.string(),
    dateFinished: z.string().nullable().default(null),
    conversionProgress: z.number().default(0),
    fileSource: TaskFileRefSchema.optional(),
    fileResult: TaskFileRefSchema.optional(),
  });

export const TaskListResponseSchema = z.object({
  error: apiError,
  data: z.array(TaskSummarySchema).default([]),
});

export const UserInfoResponseSchema = z.object({
  error: apiError,
  email: z.string().optional(),
});

export const ApiConfigResponseSchema = z.record(z.unknown());
