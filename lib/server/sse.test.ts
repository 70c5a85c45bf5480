import { describe, it, expect, vi } from "vitest";
import { sseResponse } from "./sse";

describe("sseResponse", () => {
  it("always terminates with [DONE], even with no frames", async () => {
    const response = sseResponse(async () => {});

    expect(response.headers.get("content-type")).toBe("text/event-stream; charset=utf-8");
    expect(response.headers.get("cache-control")).toBe("no-cache");
    await expect(response.text()).resolves.toBe("data: [DONE]\n\n");
  });

  it("writes frames in order", async () => {
    const response = sseResponse(async (write) => {
      write('{"content":"a"}');
      write('{"content":"b"}');
    });

    await expect(response.text()).resolves.toBe('data: {"content":"a"}\n\ndata: {"content":"b"}\n\ndata: [DONE]\n\n');
  });

  it("reports a producer failure as an error frame", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const response = sseResponse(async (write) => {
      write('{"content":"a"}');
      throw new Error("model crashed");
    });

    await expect(response.text()).resolves.toBe(
      'data: {"content":"a"}\n\ndata: {"error":"model crashed"}\n\ndata: [DONE]\n\n'
    );
    error.mockRestore();
  });

  it("aborts the producer when the caller's signal fires", async () => {
    const controller = new AbortController();
    const response = sseResponse(
      (_write, signal) =>
        new Promise<void>((_resolve, reject) => {
          signal.addEventListener("abort", () => {
            const abort = new Error("aborted");
            abort.name = "AbortError";
            reject(abort);
          });
        }),
      { signal: controller.signal }
    );

    controller.abort();

    await expect(response.text()).resolves.toBe("data: [DONE]\n\n");
  });

  it("aborts the producer when the body is cancelled", async () => {
    let aborted = false;
    const response = sseResponse(async (write, signal) => {
      write("first");
      await new Promise<void>((resolve) => {
        signal.addEventListener("abort", () => {
          aborted = true;
          resolve();
        });
      });
    });

    const reader = response.body?.getReader();
    if (!reader) throw new Error("missing body");
    const { value } = await reader.read();
    expect(new TextDecoder().decode(value)).toBe("data: first\n\n");

    await reader.cancel();
    expect(aborted).toBe(true);
  });

  it("merges extra headers", () => {
    const response = sseResponse(async () => {}, { headers: { "X-Request-Id": "req-1" } });
    expect(response.headers.get("x-request-id")).toBe("req-1");
  });
});
