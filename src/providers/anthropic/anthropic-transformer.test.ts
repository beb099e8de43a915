import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ANTHROPIC_VERSION, AnthropicTransformer, DEFAULT_MAX_TOKENS } from "./anthropic-transformer.js";
import { createCanonicalRequest } from "../../types/index.js";
import type { CanonicalRequest, CanonicalRequestInit, GenerationParams } from "../../types/index.js";
import messageFixture from "./fixtures/message-response.json" with { type: "json" };
import overloadedFixture from "./fixtures/error-overloaded.json" with { type: "json" };

const ENDPOINT = "https://api.anthropic.com/v1";
const transformer = new AnthropicTransformer();

function request(init: Partial<CanonicalRequestInit> = {}): CanonicalRequest {
  return createCanonicalRequest({
    id: "req-001",
    kind: "chat",
    model: "claude-test",
    messages: [{ role: "user", content: "hi" }],
    ...init,
  });
}

describe("AnthropicTransformer.toProvider", () => {
  it("builds a messages API request and drops seed", () => {
    const built = transformer.toProvider(
      request({
        system: "Be brief.",
        messages: [
          { role: "user", content: "hi" },
          { role: "assistant", content: "yo" },
          { role: "user", content: "again" },
        ],
        params: { temperature: 0.3, top_p: 0.9, stop: ["END"], seed: 4 },
      }),
      ENDPOINT,
    );

    expect(built.dropped).toEqual(["seed"]);
    expect(built.request).toEqual({
      method: "POST",
      url: "https://api.anthropic.com/v1/messages",
      headers: { "anthropic-version": ANTHROPIC_VERSION },
      body: {
        model: "claude-test",
        max_tokens: 1024,
        system: "Be brief.",
        messages: [
          { role: "user", content: "hi" },
          { role: "assistant", content: "yo" },
          { role: "user", content: "again" },
        ],
        temperature: 0.3,
        top_p: 0.9,
        stop_sequences: ["END"],
      },
    });
  });

  it("passes max_tokens through when set", () => {
    const built = transformer.toProvider(request({ params: { max_tokens: 64 } }), ENDPOINT);
    expect(built.request.body).toMatchObject({ max_tokens: 64 });
    expect(built.dropped).toEqual([]);
  });

  it("sets stream when streaming", () => {
    expect(transformer.toProvider(request({ stream: true }), ENDPOINT).request.body).toMatchObject({ stream: true });
  });

  it("requires the conversation to open with a user turn", () => {
    expect(() =>
      transformer.toProvider(request({ messages: [{ role: "assistant", content: "hello" }] }), ENDPOINT),
    ).toThrow(expect.objectContaining({ kind: "InvalidRequest" }));
  });

  it("supports chat only", () => {
    expect(() => transformer.toProvider(request({ kind: "completion" }), ENDPOINT)).toThrow(
      expect.objectContaining({ kind: "UnsupportedCapability", message: 'Anthropic does not support "completion"' }),
    );
  });
});

describe("AnthropicTransformer.fromProvider", () => {
  it("joins text blocks into one result item", () => {
    expect(transformer.fromProvider({ ok: true, status: 200, body: messageFixture }, request())).toMatchObject({
      id: "req-001",
      kind: "chat",
      model_used: "claude-test-1",
      result: [{ index: 0, role: "assistant", content: "Hello there", finish_reason: "stop" }],
      usage: { input_tokens: 10, output_tokens: 4, total_tokens: 14 },
    });
  });

  it.each([
    ["max_tokens", "length"],
    ["stop_sequence", "stop"],
    ["tool_use", "tool_use"],
    ["refusal", "content_filter"],
    ["pause_turn", "stop"],
  ])("maps stop_reason %s to %s", (stopReason, finish) => {
    const body = { ...messageFixture, stop_reason: stopReason };
    expect(transformer.fromProvider({ ok: true, status: 200, body }, request())).toMatchObject({
      result: [{ finish_reason: finish }],
    });
  });

  it("classifies overloaded errors as ProviderUnavailable", () => {
    expect(transformer.fromProvider({ ok: false, status: 529, body: overloadedFixture }, request())).toMatchObject({
      kind: "ProviderUnavailable",
      statusCode: 529,
      providerCode: "overloaded_error",
      message: "Overloaded",
    });
  });

  it("reports a body that is not a message", () => {
    expect(transformer.fromProvider({ ok: true, status: 200, body: { type: "error" } }, request())).toMatchObject({
      kind: "Unknown",
      message: "Malformed Anthropic response: body is not a message object",
    });
  });
});

describe("AnthropicTransformer.fromStreamEvent", () => {
  const streaming = request({ stream: true });

  it("maps text deltas", () => {
    const event = {
      event: "content_block_delta",
      data: '{"type":"content_block_delta","index":0,"delta":{"type":"text_delta","text":"Hi"}}',
    };
    expect(transformer.fromStreamEvent(event, streaming, 0)).toEqual({
      id: "req-001",
      kind: "chat",
      index: 0,
      delta: "Hi",
    });
  });

  it("maps message_delta to the finish reason and output usage", () => {
    const event = {
      event: "message_delta",
      data: '{"type":"message_delta","delta":{"stop_reason":"end_turn"},"usage":{"output_tokens":7}}',
    };
    expect(transformer.fromStreamEvent(event, streaming, 3)).toEqual({
      id: "req-001",
      kind: "chat",
      index: 3,
      delta: "",
      finish_reason: "stop",
      usage: { input_tokens: 0, output_tokens: 7, total_tokens: 7 },
    });
  });

  it("maps message_start to the input usage", () => {
    const event = {
      event: "message_start",
      data: '{"type":"message_start","message":{"id":"msg_1","usage":{"input_tokens":10,"output_tokens":1}}}',
    };
    expect(transformer.fromStreamEvent(event, streaming, 0)).toEqual({
      id: "req-001",
      kind: "chat",
      index: 0,
      delta: "",
      usage: { input_tokens: 10, output_tokens: 1, total_tokens: 11 },
    });
  });

  it("skips bookkeeping events", () => {
    expect(transformer.fromStreamEvent({ event: "ping", data: '{"type":"ping"}' }, streaming, 0)).toBeNull();
    expect(
      transformer.fromStreamEvent({ event: "message_start", data: '{"type":"message_start","message":{}}' }, streaming, 0),
    ).toBeNull();
    expect(
      transformer.fromStreamEvent(
        { event: "content_block_delta", data: '{"delta":{"type":"input_json_delta","partial_json":"{"}}' },
        streaming,
        0,
      ),
    ).toBeNull();
  });

  it("reads the event type from the payload when the event name is absent", () => {
    const event = { data: '{"type":"content_block_delta","delta":{"type":"text_delta","text":"x"}}' };
    expect(transformer.fromStreamEvent(event, streaming, 1)).toMatchObject({ delta: "x", index: 1 });
  });

  it("classifies error events", () => {
    const event = { event: "error", data: '{"type":"error","error":{"type":"rate_limit_error","message":"slow"}}' };
    expect(transformer.fromStreamEvent(event, streaming, 0)).toMatchObject({ kind: "RateLimited", message: "slow" });
  });
});

describe("AnthropicTransformer round trip", () => {
  const paramsArb: fc.Arbitrary<GenerationParams> = fc.record(
    {
      temperature: fc.double({ min: 0, max: 1, noNaN: true }),
      max_tokens: fc.integer({ min: 1, max: 8192 }),
      top_p: fc.double({ min: 0, max: 1, noNaN: true }),
      stop: fc.array(fc.string(), { maxLength: 3 }),
      seed: fc.integer(),
    },
    { requiredKeys: [] },
  );

  it("recovers everything except the dropped seed, with max_tokens defaulted", () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[a-z][a-z0-9-]{0,20}$/), paramsArb, (model, params) => {
        const req = request({ model, params });
        const echo = transformer.recoverRequest(transformer.toProvider(req, ENDPOINT).request);
        const { seed: _seed, ...kept } = params;
        expect(echo).toEqual({
          kind: "chat",
          model,
          params: { ...kept, max_tokens: params.max_tokens ?? DEFAULT_MAX_TOKENS },
        });
      }),
    );
  });
});
