import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  vi,
} from "vitest";
import { Agent, MockAgent, Request } from "undici";
import { randomBytes } from "node:crypto";
import fsp from "node:fs/promises";
import {
  type IncomingMessage,
  type Server,
  type ServerResponse,
  createServer,
} from "node:http";
import path from "node:path";
import { Readable } from "node:stream";

import {
  ConversionTools,
  FileHandle,
  NotFoundError,
  RetryExhaustedError,
  UnknownServerError,
  ValidationError,
  type ProgressEvent,
} from "../src/index.js";
import { parseContentDispositionFilename } from "../src/utils.js";
import {
  ORIGIN,
  caught,
  createAgent,
  createClient,
  expectInstance,
  recorder,
  tmpDir,
  tmpFile,
} from "./helpers.js";

describe("parseContentDispositionFilename", () => {
  it("reads quoted, bare and RFC 5987 names", () => {
    expect(
      parseContentDispositionFilename('attachment; filename="report.csv"')
    ).toBe("report.csv");
    expect(parseContentDispositionFilename("attachment; filename=data.csv")).toBe(
      "data.csv"
    );
    expect(
      parseContentDispositionFilename(
        "attachment; filename*=UTF-8''r%C3%A9sum%C3%A9.pdf"
      )
    ).toBe("résumé.pdf");
  });

  it("drops directory components", () => {
    expect(
      parseContentDispositionFilename('attachment; filename="../../etc/passwd"')
    ).toBe("passwd");
  });

  it("returns undefined without a filename", () => {
    expect(parseContentDispositionFilename("inline")).toBeUndefined();
    expect(parseContentDispositionFilename(null)).toBeUndefined();
  });
});

describe("FilesApi", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = createAgent();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await agent.close();
  });

  it("uploads a 0-byte buffer", async () => {
    const client = createClient(agent);
    const progress = recorder<ProgressEvent>();

    agent
      .get(ORIGIN)
      .intercept({ method: "POST", path: "/v1/files" })
      .reply(200, { error: null, file_id: "f-empty" });

    const handle = await client.files.upload(new Uint8Array(0), {
      fileName: "empty.txt",
      onProgress: progress,
    });

    expect(handle).toBeInstanceOf(FileHandle);
    expect(handle.id).toBe("f-empty");
    expect(handle.name).toBe("empty.txt");
    expect(handle.size).toBe(0);

    const first = progress.events[0];
    const last = progress.events[progress.events.length - 1];
    expect(first).toMatchObject({ loaded: 0, percent: 0 });
    expect(last?.percent).toBe(100);
    expect(last?.loaded).toBe(last?.total);
  });

  it("keeps upload progress from restarting on a retry", async () => {
    const client = createClient(agent, { retries: 2 });
    const progress = recorder<ProgressEvent>();
    const pool = agent.get(ORIGIN);

    pool.intercept({ method: "POST", path: "/v1/files" }).reply(503, "");
    pool
      .intercept({ method: "POST", path: "/v1/files" })
      .reply(200, { error: null, file_id: "f-retried" });

    const handle = await client.files.upload(Buffer.from("a,b\n1,2\n"), {
      fileName: "rows.csv",
      onProgress: progress,
    });

    expect(handle.id).toBe("f-retried");
    const loaded = progress.events.map((e) => e.loaded);
    expect(loaded.filter((n) => n === 0)).toHaveLength(1);
    expect(loaded).toEqual([...loaded].sort((a, b) => a - b));
    expect(progress.events[progress.events.length - 1]?.percent).toBe(100);
  });

  it("names a path upload after the file", async () => {
    const client = createClient(agent);
    const inputPath = tmpFile("input.xml");
    await fsp.writeFile(inputPath, "<rows><row>1</row></rows>");

    agent
      .get(ORIGIN)
      .intercept({ method: "POST", path: "/v1/files" })
      .reply(200, { error: null, file_id: "f-xml" });

    const handle = await client.files.upload(inputPath);

    expect(handle.name).toBe(path.basename(inputPath));
    expect(handle.size).toBe(25);

    await fsp.unlink(inputPath);
  });

  it("buffers a Readable before upload", async () => {
    const client = createClient(agent);

    agent
      .get(ORIGIN)
      .intercept({ method: "POST", path: "/v1/files" })
      .reply(200, { error: null, file_id: "f-stream" });

    const handle = await client.files.upload({
      stream: Readable.from([Buffer.from("abc"), Buffer.from("def")]),
      fileName: "letters.txt",
    });

    expect(handle).toMatchObject({
      id: "f-stream",
      name: "letters.txt",
      size: 6,
    });
  });

  it("rejects an unreadable path without a request", async () => {
    const client = createClient(agent);
    const missing = tmpFile("missing.xml");

    const err = await caught(client.files.upload(missing));

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({
      message: `File not found or not readable: ${missing}`,
    });
  });

  it("surfaces an error field in the upload response", async () => {
    const client = createClient(agent);

    agent
      .get(ORIGIN)
      .intercept({ method: "POST", path: "/v1/files" })
      .reply(200, { error: "File is too large" });

    const err = await caught(client.files.upload(Buffer.from("x")));

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: "File is too large" });
  });

  it("rejects an upload response without file_id", async () => {
    const client = createClient(agent);

    agent
      .get(ORIGIN)
      .intercept({ method: "POST", path: "/v1/files" })
      .reply(200, { error: null });

    const err = await caught(client.files.upload(Buffer.from("x")));

    expect(err).toBeInstanceOf(UnknownServerError);
  });

  it("fills in a handle from getInfo", async () => {
    const client = createClient(agent);
    const handle = client.files.handle("f1");

    agent
      .get(ORIGIN)
      .intercept({ method: "GET", path: "/v1/files/f1/info" })
      .reply(200, { name: "data.csv", size: 12, preview: false });

    const info = await client.files.getInfo(handle);

    expect(info).toEqual({ name: "data.csv", size: 12, preview: false });
    expect(handle).toMatchObject({ id: "f1", name: "data.csv", size: 12 });
  });

  it("reports unknown files as not found", async () => {
    const client = createClient(agent);

    agent
      .get(ORIGIN)
      .intercept({ method: "GET", path: "/v1/files/f-gone/info" })
      .reply(404, { error: "File not found" });

    const err = await caught(client.files.getInfo("f-gone"));

    const notFound = expectInstance(err, NotFoundError);
    expect(notFound.resource).toBe("file");
  });

  it("reports download progress against Content-Length", async () => {
    const client = createClient(agent);
    const progress = recorder<ProgressEvent>();

    agent
      .get(ORIGIN)
      .intercept({ method: "GET", path: "/v1/files/f1" })
      .reply(200, Buffer.from("hello"), {
        headers: { "content-length": "5" },
      });

    const bytes = await client.files.downloadBytes("f1", {
      onProgress: progress,
    });

    expect(bytes.toString()).toBe("hello");
    expect(progress.events[0]).toEqual({ loaded: 0, total: 5, percent: 0 });
    expect(progress.events[progress.events.length - 1]).toEqual({
      loaded: 5,
      total: 5,
      percent: 100,
    });
  });

  it("omits total and percent without Content-Length", async () => {
    const client = createClient(agent);
    const progress = recorder<ProgressEvent>();

    agent
      .get(ORIGIN)
      .intercept({ method: "GET", path: "/v1/files/f1" })
      .reply(200, Buffer.from("hello"));

    await client.files.downloadBytes("f1", { onProgress: progress });

    expect(progress.events[0]).toEqual({ loaded: 0 });
    expect(progress.events[progress.events.length - 1]).toEqual({ loaded: 5 });
  });

  it("writes to a destination, creating parent directories", async () => {
    const client = createClient(agent);
    const dir = await tmpDir();
    const outPath = path.join(dir, "nested", "deeper", "out.csv");

    agent
      .get(ORIGIN)
      .intercept({ method: "GET", path: "/v1/files/f1" })
      .reply(200, Buffer.from("a,b\n1,2\n"));

    const written = await client.files.downloadTo("f1", outPath);

    expect(written).toBe(outPath);
    expect(await fsp.readFile(outPath, "utf8")).toBe("a,b\n1,2\n");
    expect(await fsp.readdir(path.dirname(outPath))).toEqual(["out.csv"]);

    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("names the file from Content-Disposition in the working directory", async () => {
    const client = createClient(agent);
    const dir = await tmpDir();
    vi.spyOn(process, "cwd").mockReturnValue(dir);

    agent
      .get(ORIGIN)
      .intercept({ method: "GET", path: "/v1/files/f1" })
      .reply(200, Buffer.from("a,b\n"), {
        headers: { "content-disposition": 'attachment; filename="result.csv"' },
      });

    const written = await client.files.downloadTo("f1");

    expect(written).toBe(path.join(dir, "result.csv"));
    expect(await fsp.readFile(written, "utf8")).toBe("a,b\n");

    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("leaves no partial file when the final rename fails", async () => {
    const client = createClient(agent);
    const dir = await tmpDir();
    const taken = path.join(dir, "taken");
    await fsp.mkdir(taken);
    await fsp.writeFile(path.join(taken, "keep.txt"), "keep");

    agent
      .get(ORIGIN)
      .intercept({ method: "GET", path: "/v1/files/f1" })
      .reply(200, Buffer.from("payload"));

    const err = await caught(client.files.downloadTo("f1", taken));

    expect(err).toMatchObject({ code: "UNKNOWN" });
    expect(await fsp.readdir(dir)).toEqual(["taken"]);

    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("rejects an empty file id", async () => {
    const client = createClient(agent);

    await expect(client.files.downloadBytes(" ")).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});

/* --------------------------- In-process file store -------------------------- */

describe("FilesApi against an in-process file store", () => {
  const stored = new Map<string, Buffer>();
  let server: Server;
  let dispatcher: Agent;
  let baseUrl: string;

  async function readBody(req: IncomingMessage): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) chunks.push(Buffer.from(chunk));
    return Buffer.concat(chunks);
  }

  async function handle(req: IncomingMessage, res: ServerResponse) {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "POST" && url.pathname === "/v1/files") {
      const form = await new Request("http://localhost/v1/files", {
        method: "POST",
        headers: { "content-type": req.headers["content-type"] ?? "" },
        body: await readBody(req),
      }).formData();

      const entry = form.get("file");
      if (entry === null || typeof entry === "string") {
        res.writeHead(400, { "content-type": "application/json" });
        res.end(JSON.stringify({ error: "file field is required" }));
        return;
      }

      const id = `f${stored.size + 1}`;
      stored.set(id, Buffer.from(await entry.arrayBuffer()));
      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ error: null, file_id: id }));
      return;
    }

    if (req.method === "GET" && url.pathname === "/v1/files/broken") {
      res.writeHead(200, { "content-length": "1000" });
      res.write(Buffer.alloc(10));
      setTimeout(() => res.destroy(), 20);
      return;
    }

    const match = /^\/v1\/files\/([^/]+)$/.exec(url.pathname);
    const bytes = match?.[1] ? stored.get(match[1]) : undefined;
    if (req.method === "GET" && bytes) {
      res.writeHead(200, {
        "content-type": "application/octet-stream",
        "content-length": String(bytes.byteLength),
        "content-disposition": 'attachment; filename="stored.bin"',
      });
      res.end(bytes);
      return;
    }

    res.writeHead(404, { "content-type": "application/json" });
    res.end(JSON.stringify({ error: "File not found" }));
  }

  beforeAll(async () => {
    server = createServer((req, res) => {
      handle(req, res).catch((err: unknown) => {
        res.statusCode = 500;
        res.end(String(err));
      });
    });
    await new Promise<void>((resolve) =>
      server.listen(0, "127.0.0.1", resolve)
    );

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Expected a TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}/v1`;
    dispatcher = new Agent();
  });

  afterAll(async () => {
    await dispatcher.close();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
  });

  function localClient() {
    return new ConversionTools({
      apiToken: "test-token",
      baseUrl,
      dispatcher,
      retries: 1,
    });
  }

  it("downloads exactly the bytes it uploaded", async () => {
    const client = localClient();
    const payload = randomBytes(200 * 1024);
    const progress = recorder<ProgressEvent>();

    const handle = await client.files.upload(payload, {
      fileName: "blob.bin",
      onProgress: progress,
    });
    const downloaded = await client.files.downloadBytes(handle);

    expect(downloaded.equals(payload)).toBe(true);

    const percents = progress.events.map((e) => e.percent ?? 0);
    expect(percents[0]).toBe(0);
    expect(percents[percents.length - 1]).toBe(100);
    percents.slice(1).forEach((p, i) => {
      expect(p).toBeGreaterThanOrEqual(percents[i] ?? 0);
    });
  });

  it("round-trips a local file through downloadTo", async () => {
    const client = localClient();
    const dir = await tmpDir();
    const inputPath = path.join(dir, "input.csv");
    await fsp.writeFile(inputPath, "id,name\n1,alpha\n");

    const handle = await client.files.upload(inputPath);
    const outPath = await client.files.downloadTo(
      handle,
      path.join(dir, "copy.csv")
    );

    expect(await fsp.readFile(outPath, "utf8")).toBe("id,name\n1,alpha\n");

    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("removes the partial file when the body breaks off", async () => {
    const client = localClient();
    const dir = await tmpDir();

    const err = await caught(
      client.files.downloadTo("broken", path.join(dir, "out.bin"))
    );

    const exhausted = expectInstance(err, RetryExhaustedError);
    expect(exhausted.cause).toMatchObject({ code: "TRANSPORT_ERROR" });
    expect(await fsp.readdir(dir)).toEqual([]);

    await fsp.rm(dir, { recursive: true, force: true });
  });
});
