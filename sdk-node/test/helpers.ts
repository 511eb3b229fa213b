import { expect } from "vitest";
import { MockAgent } from "undici";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  ConversionTools,
  type ConversionToolsClientOptions,
  type LogContext,
  type Logger,
  type ProgressObserver,
} from "../src/index.js";

export const ORIGIN = "https://api.conversiontools.io";

export function tmpFile(name: string) {
  return path.join(
    os.tmpdir(),
    `conversiontools-sdk-${Date.now()}-${Math.random()
      .toString(16)
      .slice(2)}-${name}`
  );
}

export function tmpDir(): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), "conversiontools-sdk-"));
}

export function createAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect(); // ensure no real network
  return agent;
}

type TestClientOptions = Omit<
  ConversionToolsClientOptions,
  "apiToken" | "dispatcher"
>;

/** Fast timings and a single attempt unless a test says otherwise. */
export function createClient(agent: MockAgent, overrides: TestClientOptions = {}) {
  return new ConversionTools({
    apiToken: "test-token",
    dispatcher: agent,
    timeoutMs: 5_000,
    retries: 1,
    retryDelayMs: 1,
    maxRetryDelayMs: 5,
    pollingIntervalMs: 5,
    maxPollingIntervalMs: 20,
    ...overrides,
  });
}

export type LogEntry = {
  level: "debug" | "warn";
  message: string;
  context?: LogContext;
};

export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug(message, context) {
      entries.push({ level: "debug", message, context });
    },
    warn(message, context) {
      entries.push({ level: "warn", message, context });
    },
  };
}

export function recorder<E>(): ProgressObserver<E> & { events: E[] } {
  const events: E[] = [];
  return {
    events,
    onProgress(event) {
      events.push(event);
    },
  };
}

export async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("Expected promise to reject");
}

export function expectInstance<T>(
  value: unknown,
  ctor: new (...args: never[]) => T
): T {
  expect(value).toBeInstanceOf(ctor);
  if (!(value instanceof ctor)) throw new Error(`Expected ${ctor.name}`);
  return value;
}
