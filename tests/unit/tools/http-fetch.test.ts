import { describe, it, expect, vi, afterEach } from "vitest";

import httpFetch from "../../../src/tools/built-in/http-fetch.js";
import type { ToolContext } from "../../../src/agent/types.js";
import { createSilentLogger } from "../../../src/log.js";

function makeCtx(): ToolContext {
  return { workspaceDir: "/tmp", logger: createSilentLogger(), defaultTimeoutMs: 1000, allowOutsideWorkspace: false };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("http-fetch tool", () => {
  it("returns the status line and body", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response("hello body", { status: 200, statusText: "OK" })
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await httpFetch.execute({ url: "https://example.test/page", method: "get" }, makeCtx());

    expect(result).toEqual({ ok: true, output: "status: 200 OK\n\nhello body" });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://example.test/page");
    expect(init?.method).toBe("GET");
    expect(init?.body).toBeUndefined();
  });

  it("sends a body for POST", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response("created", { status: 201, statusText: "Created" }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await httpFetch.execute(
      { url: "http://api.test/items", method: "POST", headers: { "content-type": "application/json" }, body: '{"a":1}' },
      makeCtx()
    );

    expect(result).toEqual({ ok: true, output: "status: 201 Created\n\ncreated" });
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.body).toBe('{"a":1}');
    expect(init?.headers).toEqual({ "content-type": "application/json" });
  });

  it("reports a non-2xx response as a failure", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("missing", { status: 404, statusText: "Not Found" })));

    const result = await httpFetch.execute({ url: "https://example.test/gone" }, makeCtx());

    expect(result).toEqual({ ok: false, error: "status: 404 Not Found\n\nmissing" });
  });

  it("reports a network failure", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));

    const result = await httpFetch.execute({ url: "https://example.test/" }, makeCtx());

    expect(result).toEqual({ ok: false, error: "Request failed: fetch failed" });
  });

  it("truncates long bodies", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("a".repeat(100_010), { status: 200, statusText: "OK" })));

    const result = await httpFetch.execute({ url: "https://example.test/big" }, makeCtx());

    expect(result).toEqual({ ok: true, output: `status: 200 OK\n\n${"a".repeat(100_000)}\n...[truncated]` });
  });

  it("rejects a non-http URL", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const result = await httpFetch.execute({ url: "file:///etc/passwd" }, makeCtx());

    expect(result).toEqual({ ok: false, error: "Invalid parameters: url: only http and https URLs are supported" });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
