import { describe, it, expect } from "vitest";
import { InMemoryTransport } from "./in-memory-transport.js";
import { TransportAbortedError, TransportTimeoutError } from "./transport.js";
import type { ProviderRequest } from "./transport.js";
import { credentialsFromSecret } from "../credentials/index.js";

const CREDS = credentialsFromSecret("api-key-header", "test-secret");
const REQUEST: ProviderRequest = { method: "POST", url: "https://p.test/v1/x", headers: { a: "1" }, body: {} };
const OPTIONS = { timeoutMs: 100 };

describe("InMemoryTransport.send", () => {
  it("answers in script order and repeats the last reply", async () => {
    const transport = new InMemoryTransport({
      replies: [
        { ok: true, status: 200, body: 1 },
        { ok: true, status: 200, body: 2 },
      ],
    });
    const bodies: unknown[] = [];
    for (let i = 0; i < 3; i++) bodies.push((await transport.send(REQUEST, CREDS, OPTIONS)).body);
    expect(bodies).toEqual([1, 2, 2]);
  });

  it("records requests with applied credential headers", async () => {
    const transport = new InMemoryTransport({ replies: [{ ok: true, status: 200, body: null }] });
    await transport.send(REQUEST, CREDS, OPTIONS);
    expect(transport.lastRequest).toBe(REQUEST);
    expect(transport.sent[0]?.headers).toEqual({ a: "1", "x-api-key": "test-secret" });
  });

  it("answers from a function of the request", async () => {
    const transport = new InMemoryTransport({ replies: [(req) => ({ ok: true, status: 200, body: req.url })] });
    expect((await transport.send(REQUEST, CREDS, OPTIONS)).body).toBe("https://p.test/v1/x");
  });

  it("simulates timeouts, failures and hangs", async () => {
    const failure = new Error("socket closed");
    const transport = new InMemoryTransport({ replies: [{ timeout: true }, { fail: failure }, { hang: true }] });
    await expect(transport.send(REQUEST, CREDS, OPTIONS)).rejects.toBeInstanceOf(TransportTimeoutError);
    await expect(transport.send(REQUEST, CREDS, OPTIONS)).rejects.toBe(failure);

    const controller = new AbortController();
    const pending = transport.send(REQUEST, CREDS, { ...OPTIONS, signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(TransportAbortedError);
  });

  it("throws when nothing is scripted", async () => {
    await expect(new InMemoryTransport().send(REQUEST, CREDS, OPTIONS)).rejects.toThrow(
      "InMemoryTransport has no reply scripted for POST https://p.test/v1/x",
    );
  });
});

describe("InMemoryTransport.open", () => {
  it("counts delivered events and closes once on early exit", async () => {
    const transport = new InMemoryTransport({ streams: [[{ data: "a" }, { data: "b" }, { data: "c" }]] });
    const stream = await transport.open(REQUEST, CREDS, OPTIONS);
    if ("ok" in stream) throw new Error("expected a stream");

    for await (const _event of stream) break;
    await stream.close();

    const [recorded] = transport.streams;
    expect(recorded?.delivered).toBe(1);
    expect(recorded?.closed).toBe(true);
    expect(recorded?.closeCount).toBe(1);
  });

  it("returns a scripted ProviderError", async () => {
    const transport = new InMemoryTransport({ streams: [{ ok: false, status: 429, body: null }] });
    expect(await transport.open(REQUEST, CREDS, OPTIONS)).toEqual({ ok: false, status: 429, body: null });
  });
});
