import { access, constants, stat } from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { ReadableStream } from "node:stream/web";
import { File, FormData } from "formdata-node";
import { fileFromPath } from "formdata-node/file-from-path";
import { Response, type BodyInit } from "undici";

import { UnknownServerError, ValidationError } from "./errors.js";
import type { HttpClient, PreparedBody } from "./http.js";
import { FileInfoSchema, FileUploadResponseSchema } from "./schemas.js";
import type {
  DownloadOptions,
  FileInfo,
  ProgressEvent,
  ProgressObserver,
  UploadOptions,
  UploadSource,
} from "./types.js";
import {
  parseContentDispositionFilename,
  percentOf,
  streamToFileAtomic,
} from "./utils.js";

const UPLOAD_CHUNK_BYTES = 64 * 1024;
const DEFAULT_UPLOAD_NAME = "file";
const DEFAULT_DOWNLOAD_NAME = "result";

/**
 * Reference to a file held by the service. Only `id` is guaranteed; `name`
 * and `size` are filled in by `FilesApi.getInfo`.
 */
export class FileHandle {
  readonly id: string;
  name?: string;
  size?: number;

  constructor(id: string, info?: Partial<FileInfo>) {
    this.id = id;
    this.name = info?.name;
    this.size = info?.size;
  }
}

export type FileRef = FileHandle | string;

/* ---------------------------------- Utils --------------------------------- */

function asBodyInit(body: unknown): BodyInit {
  return body as BodyInit;
}

function fileIdOf(ref: FileRef): string {
  const id = typeof ref === "string" ? ref : ref.id;
  if (!id?.trim()) {
    throw new ValidationError({ message: "File ID is required" });
  }
  return id;
}

function progressEvent(loaded: number, total?: number): ProgressEvent {
  if (total === undefined) return { loaded };
  return { loaded, total, percent: percentOf(loaded, total) };
}

function parseContentLength(value: string | null): number | undefined {
  if (value === null) return undefined;
  const length = Number.parseInt(value, 10);
  return Number.isFinite(length) && length >= 0 ? length : undefined;
}

async function readAll(
  stream: Readable | ReadableStream<Uint8Array>
): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(Buffer.from(chunk));
  return Buffer.concat(chunks);
}

async function fileFromLocalPath(
  filePath: string,
  fileName?: string
): Promise<File> {
  if (!filePath.trim()) {
    throw new ValidationError({ message: "File path is required" });
  }

  try {
    await access(filePath, constants.R_OK);
  } catch {
    throw new ValidationError({
      message: `File not found or not readable: ${filePath}`,
    });
  }

  const info = await stat(filePath);
  if (!info.isFile()) {
    throw new ValidationError({ message: `Not a file: ${filePath}` });
  }

  return fileFromPath(filePath, fileName ?? path.basename(filePath));
}

function streamName(stream: Readable | ReadableStream<Uint8Array>) {
  // fs.ReadStream carries the path it reads from
  if (stream instanceof Readable && "path" in stream) {
    const p = stream.path;
    if (typeof p === "string") return path.basename(p);
  }
  return undefined;
}

/**
 * Turns any accepted source into a multipart-ready File. Streams are read
 * into memory first, which is what lets upload progress report a real total
 * for them.
 */
export async function toUploadFile(
  source: UploadSource,
  fileName?: string
): Promise<File> {
  if (typeof source === "string") {
    return fileFromLocalPath(source, fileName);
  }

  if (source instanceof Uint8Array) {
    return new File([source], fileName ?? DEFAULT_UPLOAD_NAME);
  }

  if (source instanceof Readable || source instanceof ReadableStream) {
    const bytes = await readAll(source);
    const name = fileName ?? streamName(source) ?? DEFAULT_UPLOAD_NAME;
    return new File([bytes], name);
  }

  if ("path" in source) {
    return fileFromLocalPath(source.path, fileName ?? source.fileName);
  }

  if ("buffer" in source) {
    const name = fileName ?? source.fileName ?? DEFAULT_UPLOAD_NAME;
    return new File([source.buffer], name);
  }

  if ("stream" in source) {
    const bytes = await readAll(source.stream);
    const name =
      fileName ??
      source.fileName ??
      streamName(source.stream) ??
      DEFAULT_UPLOAD_NAME;
    return new File([bytes], name);
  }

  throw new ValidationError({ message: "Unsupported upload source" });
}

type ProgressSink = (loaded: number, total: number) => void;

/**
 * Encodes the form up front so the exact body length is known, then hands
 * it to fetch in fixed-size chunks, reporting each chunk as it is pulled.
 */
async function encodeMultipart(
  file: File,
  report: ProgressSink
): Promise<PreparedBody> {
  const form = new FormData();
  form.set("file", file);

  const encoded = new Response(asBodyInit(form));
  const contentType = encoded.headers.get("content-type");
  const bytes = new Uint8Array(await encoded.arrayBuffer());
  const total = bytes.byteLength;

  let offset = 0;
  report(0, total);

  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (offset >= total) {
        controller.close();
        return;
      }
      const chunk = bytes.subarray(offset, offset + UPLOAD_CHUNK_BYTES);
      offset += chunk.byteLength;
      controller.enqueue(chunk);
      report(offset, total);
    },
  });

  return {
    body,
    headers: contentType ? { "content-type": contentType } : undefined,
    duplex: "half",
  };
}

async function* trackBody(
  res: Response,
  onProgress?: ProgressObserver<ProgressEvent>
): AsyncGenerator<Buffer> {
  const total = parseContentLength(res.headers.get("content-length"));
  let loaded = 0;

  onProgress?.onProgress(progressEvent(loaded, total));
  if (!res.body) return;

  for await (const chunk of res.body) {
    const bytes: Uint8Array = chunk;
    loaded += bytes.byteLength;
    onProgress?.onProgress(progressEvent(loaded, total));
    yield Buffer.from(bytes);
  }
}

/* ---------------------------------- API ----------------------------------- */

export type FilesApiDefaults = {
  onUploadProgress?: ProgressObserver<ProgressEvent>;
  onDownloadProgress?: ProgressObserver<ProgressEvent>;
};

/**
 * Upload, inspect and download files held by the service. Nothing here
 * deletes server-side files.
 */
export class FilesApi {
  constructor(
    private readonly http: HttpClient,
    private readonly defaults: FilesApiDefaults = {}
  ) {}

  handle(id: string): FileHandle {
    return new FileHandle(fileIdOf(id));
  }

  async upload(
    source: UploadSource,
    opts: UploadOptions = {}
  ): Promise<FileHandle> {
    const file = await toUploadFile(source, opts.fileName);
    return this.uploadFile(file, opts);
  }

  /** Uploads an already prepared File; `opts.fileName` is ignored here. */
  async uploadFile(
    file: File,
    opts: UploadOptions = {}
  ): Promise<FileHandle> {
    const observer = opts.onProgress ?? this.defaults.onUploadProgress;

    let lastLoaded = -1;
    let lastTotal = 0;
    const report: ProgressSink = (loaded, total) => {
      lastTotal = total;
      // a retried upload starts from zero; stay at the highest point reported
      if (loaded <= lastLoaded) return;
      lastLoaded = loaded;
      observer?.onProgress(progressEvent(loaded, total));
    };

    const res = await this.http.json(
      {
        method: "POST",
        path: "/files",
        resource: "file",
        signal: opts.signal,
        body: () => encodeMultipart(file, report),
      },
      FileUploadResponseSchema
    );

    if (res.error) {
      throw new ValidationError({ message: res.error, details: res });
    }
    if (!res.file_id) {
      throw new UnknownServerError({
        message: "Upload response is missing file_id",
        details: res,
      });
    }

    // the server has the whole body now, whether or not fetch pulled it in chunks
    report(lastTotal, lastTotal);

    return new FileHandle(res.file_id, { name: file.name, size: file.size });
  }

  async getInfo(
    ref: FileRef,
    opts: { signal?: AbortSignal } = {}
  ): Promise<FileInfo> {
    const id = fileIdOf(ref);

    const info = await this.http.json(
      {
        method: "GET",
        path: `/files/${encodeURIComponent(id)}/info`,
        resource: "file",
        signal: opts.signal,
      },
      FileInfoSchema
    );

    if (ref instanceof FileHandle) {
      ref.name = info.name;
      ref.size = info.size;
    }

    return info;
  }

  async downloadBytes(
    ref: FileRef,
    opts: DownloadOptions = {}
  ): Promise<Buffer> {
    const id = fileIdOf(ref);
    const observer = opts.onProgress ?? this.defaults.onDownloadProgress;

    return this.http.send(
      {
        method: "GET",
        path: `/files/${encodeURIComponent(id)}`,
        resource: "file",
        signal: opts.signal,
      },
      async (res) => {
        const chunks: Buffer[] = [];
        for await (const chunk of trackBody(res, observer)) chunks.push(chunk);
        return Buffer.concat(chunks);
      }
    );
  }

  /**
   * Writes the file to `destination`, or to the name from Content-Disposition
   * (else "result") in the working directory. Either the full file lands at
   * the target path or nothing does.
   */
  async downloadTo(
    ref: FileRef,
    destination?: string,
    opts: DownloadOptions = {}
  ): Promise<string> {
    const id = fileIdOf(ref);
    const observer = opts.onProgress ?? this.defaults.onDownloadProgress;

    return this.http.send(
      {
        method: "GET",
        path: `/files/${encodeURIComponent(id)}`,
        resource: "file",
        signal: opts.signal,
      },
      async (res) => {
        const target = path.resolve(
          destination ??
            parseContentDispositionFilename(
              res.headers.get("content-disposition")
            ) ??
            DEFAULT_DOWNLOAD_NAME
        );

        await streamToFileAtomic(
          Readable.from(trackBody(res, observer)),
          target
        );
        return target;
      }
    );
  }
}
