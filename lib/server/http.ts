/**
 * Node HTTP adapter
 *
 * Serves a Web-standard `(Request) => Promise<Response>` handler from a
 * node:http server. Response bodies are written chunk by chunk as they are
 * produced; a client disconnect aborts the request's signal.
 */

import http from "http";
import type { Writable } from "stream";
import { ListenerBindError, getErrorMessage } from "@/lib/errors";

export type FetchHandler = (request: Request) => Promise<Response>;

export interface ListenOptions {
  port: number;
  host?: string;
}

export interface HttpListener {
  readonly port: number;
  readonly host: string;
  /** Requests currently being handled */
  readonly inFlight: number;
  /**
   * Stop accepting connections, wait up to `graceMs` for in-flight requests,
   * then drop whatever is still open.
   */
  close(graceMs?: number): Promise<void>;
}

function toHeaders(incoming: http.IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incoming)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(key, item);
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }
  return headers;
}

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Write a chunk, waiting for the socket to drain when its buffer is full.
 * Resolves early if the stream closes while waiting.
 */
export async function writeChunk(stream: Writable, chunk: Uint8Array): Promise<void> {
  if (stream.write(chunk)) return;

  await new Promise<void>((resolve) => {
    const done = () => {
      stream.off("drain", done);
      stream.off("close", done);
      resolve();
    };
    stream.on("drain", done);
    stream.on("close", done);
  });
}

async function writeResponse(response: Response, res: http.ServerResponse): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });

  if (!response.body) {
    res.end();
    return;
  }

  const reader = response.body.getReader();
  res.on("close", () => {
    if (!res.writableFinished) {
      reader.cancel().catch((error: unknown) => {
        console.warn("[http] Failed to cancel response body:", getErrorMessage(error));
      });
    }
  });

  res.flushHeaders();

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    if (res.destroyed) return;
    await writeChunk(res, value);
  }
  res.end();
}

async function handleNodeRequest(
  handler: FetchHandler,
  req: http.IncomingMessage,
  res: http.ServerResponse
): Promise<void> {
  const abortController = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) abortController.abort();
  });

  try {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const body = method === "GET" || method === "HEAD" ? undefined : await readBody(req);

    const request = new Request(url, {
      method,
      headers: toHeaders(req.headers),
      body,
      signal: abortController.signal,
    });

    const response = await handler(request);
    await writeResponse(response, res);
  } catch (error) {
    console.error("[http] Request failed:", getErrorMessage(error));
    if (!res.headersSent) {
      res.statusCode = 500;
      res.end();
    } else {
      res.destroy();
    }
  }
}

/**
 * Bind a listener. Resolves once the port is bound; bind failures reject
 * with ListenerBindError.
 */
export async function listen(handler: FetchHandler, options: ListenOptions): Promise<HttpListener> {
  const host = options.host ?? "127.0.0.1";
  let inFlight = 0;
  const idle = new Set<() => void>();

  const server = http.createServer((req, res) => {
    inFlight++;
    res.on("close", () => {
      inFlight--;
      if (inFlight === 0) {
        for (const notify of idle) notify();
        idle.clear();
      }
    });
    void handleNodeRequest(handler, req, res);
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(new ListenerBindError(options.port, error));
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(options.port, host);
  });

  server.on("error", (error) => {
    console.error(`[http] Server error on port ${options.port}:`, error.message);
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;

  const waitForIdle = (graceMs: number) =>
    new Promise<void>((resolve) => {
      if (inFlight === 0) {
        resolve();
        return;
      }
      const timer = setTimeout(() => {
        idle.delete(done);
        resolve();
      }, graceMs);
      const done = () => {
        clearTimeout(timer);
        resolve();
      };
      idle.add(done);
    });

  return {
    port,
    host,
    get inFlight() {
      return inFlight;
    },
    async close(graceMs = 5000) {
      const closed = new Promise<void>((resolve) => server.close(() => resolve()));
      server.closeIdleConnections();
      await waitForIdle(graceMs);
      server.closeAllConnections();
      await closed;
    },
  };
}
