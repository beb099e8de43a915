import { describe, it, expect, expectTypeOf } from "vitest";
import { createCanonicalRequest, messageText, presentParams } from "./canonical-request.js";
import type { CanonicalRequest, CanonicalRequestInit, OperationKind } from "./canonical-request.js";

const CHAT: CanonicalRequestInit = {
  id: "req-001",
  kind: "chat",
  model: "m1",
  messages: [{ role: "user", content: "hi" }],
};

describe("CanonicalRequest type shape", () => {
  it("kind is the closed set of operations", () => {
    expectTypeOf<OperationKind>().toEqualTypeOf<"chat" | "completion" | "embedding" | "fine_tune" | "online_predict">();
  });

  it("fields are readonly", () => {
    expectTypeOf<CanonicalRequest>().toHaveProperty("kind").toEqualTypeOf<OperationKind>();
    expectTypeOf<CanonicalRequest["stream"]>().toBeBoolean();
  });
});

describe("createCanonicalRequest", () => {
  it("fills defaults and deep-freezes", () => {
    const request = createCanonicalRequest(CHAT);
    expect(request).toEqual({
      id: "req-001",
      kind: "chat",
      model: "m1",
      messages: [{ role: "user", content: "hi" }],
      params: {},
      stream: false,
    });
    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.messages)).toBe(true);
    expect(Object.isFrozen(request.messages[0])).toBe(true);
    expect(Object.isFrozen(request.params)).toBe(true);
  });

  it("generates an id when none is given", () => {
    const { id: _omit, ...rest } = CHAT;
    const a = createCanonicalRequest(rest);
    const b = createCanonicalRequest(rest);
    expect(a.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(a.id).not.toBe(b.id);
  });

  it("copies the caller's arrays", () => {
    const messages: CanonicalRequestInit["messages"] = [{ role: "user", content: "hi" }];
    const request = createCanonicalRequest({ ...CHAT, messages });
    messages.push({ role: "user", content: "later" });
    expect(request.messages).toHaveLength(1);
  });

  it.each<[string, CanonicalRequestInit]>([
    ["empty model", { ...CHAT, model: " " }],
    ["no messages", { ...CHAT, messages: [] }],
    ["non-finite temperature", { ...CHAT, params: { temperature: Number.NaN } }],
    ["fractional max_tokens", { ...CHAT, params: { max_tokens: 1.5 } }],
    ["zero max_tokens", { ...CHAT, params: { max_tokens: 0 } }],
    ["streamed embedding", { ...CHAT, kind: "embedding", stream: true }],
    ["fine_tune without spec", { kind: "fine_tune", model: "base" }],
    [
      "fine_tune spec on a chat request",
      { ...CHAT, fine_tune: { dataset: "file-1", base_model: "m1", hyperparameters: {} } },
    ],
    [
      "fine_tune with a different base model",
      { kind: "fine_tune", model: "base", fine_tune: { dataset: "file-1", base_model: "other", hyperparameters: {} } },
    ],
    [
      "fine_tune with an empty dataset",
      { kind: "fine_tune", model: "base", fine_tune: { dataset: "", base_model: "base", hyperparameters: {} } },
    ],
  ])("rejects %s with InvalidRequest", (_label, init) => {
    expect(() => createCanonicalRequest(init)).toThrow(expect.objectContaining({ kind: "InvalidRequest" }));
  });

  it("rejects an unknown kind", () => {
    const init = { ...CHAT, kind: "translate" };
    expect(() => createCanonicalRequest(JSON.parse(JSON.stringify(init)) as CanonicalRequestInit)).toThrow(
      expect.objectContaining({ kind: "InvalidRequest", message: 'Unknown operation kind "translate"' }),
    );
  });

  it("accepts a fine_tune request without messages", () => {
    const request = createCanonicalRequest({
      kind: "fine_tune",
      model: "base",
      fine_tune: { dataset: "file-1", base_model: "base", hyperparameters: { epochs: 3 } },
    });
    expect(request.messages).toEqual([]);
    expect(request.fine_tune?.hyperparameters).toEqual({ epochs: 3 });
    expect(Object.isFrozen(request.fine_tune?.hyperparameters)).toBe(true);
  });
});

describe("messageText", () => {
  it("returns string content unchanged", () => {
    expect(messageText({ role: "user", content: "plain" })).toBe("plain");
  });

  it("joins text and serialised JSON items with newlines", () => {
    expect(
      messageText({
        role: "user",
        content: [
          { type: "text", text: "look:" },
          { type: "json", value: { a: 1 } },
        ],
      }),
    ).toBe('look:\n{"a":1}');
  });
});

describe("presentParams", () => {
  it("lists set params in canonical order", () => {
    expect(presentParams({ seed: 1, temperature: 0.2, stop: ["x"] })).toEqual(["temperature", "stop", "seed"]);
  });
});
