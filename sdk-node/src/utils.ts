import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { pipeline } from "node:stream/promises";
import type { Readable } from "node:stream";

import { RequestAbortedError } from "./errors.js";

/**
 * Resolves after `ms`, or rejects with RequestAbortedError as soon as
 * `signal` fires. The timer is cleared either way.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestAbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RequestAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function percentOf(loaded: number, total?: number): number | undefined {
  if (total === undefined || total <= 0) return undefined;
  return Math.min(100, Math.round((loaded / total) * 100));
}

export function parseRetryAfterMs(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number.parseInt(value, 10);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds) * 1000;
  }
  const parsedDate = Date.parse(value);
  if (!Number.isNaN(parsedDate)) {
    return Math.max(0, parsedDate - Date.now());
  }
  return undefined;
}

export function parseContentDispositionFilename(
  header: string | null
): string | undefined {
  if (!header) return undefined;

  const encoded = /filename\*\s*=\s*(?:UTF-8'')?([^;]+)/i.exec(header);
  if (encoded?.[1]) {
    try {
      return path.basename(decodeURIComponent(encoded[1].trim()));
    } catch {
      // malformed percent-encoding, try the plain parameter
    }
  }

  const plain = /filename\s*=\s*("([^"]*)"|[^;]*)/i.exec(header);
  const value = (plain?.[2] ?? plain?.[1])?.trim();
  return value ? path.basename(value) : undefined;
}

/**
 * Merge multiple AbortSignals into one.
 * Returns the merged signal and a cleanup function to avoid listener leaks.
 */
export function mergeAbortSignals(...signals: (AbortSignal | undefined)[]): {
  signal?: AbortSignal;
  cleanup: () => void;
} {
  const active = signals.filter((s): s is AbortSignal => s != null);

  if (active.length === 0) {
    return { signal: undefined, cleanup: () => {} };
  }

  if (active.length === 1) {
    return { signal: active[0], cleanup: () => {} };
  }

  const aborted = active.find((s) => s.aborted);
  if (aborted) {
    return { signal: aborted, cleanup: () => {} };
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort();

  active.forEach((s) => s.addEventListener("abort", onAbort));

  return {
    signal: controller.signal,
    cleanup: () => {
      active.forEach((s) => s.removeEventListener("abort", onAbort));
    },
  };
}

/**
 * Streams `source` into `outPath` through a sibling `.part` file that is
 * renamed into place only once every byte is written.
 */
export async function streamToFileAtomic(
  source: Readable,
  outPath: string
): Promise<void> {
  const dir = path.dirname(outPath);
  await mkdir(dir, { recursive: true });

  const tmpPath = path.join(
    dir,
    `.${path.basename(outPath)}.${randomBytes(6).toString("hex")}.part`
  );

  try {
    await pipeline(source, createWriteStream(tmpPath));
    await rename(tmpPath, outPath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}
