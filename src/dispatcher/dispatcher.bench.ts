import { bench, describe } from "vitest";
import { Dispatcher } from "./dispatcher.js";
import { createCanonicalRequest } from "../types/index.js";
import { CapabilityRegistry } from "../registry/index.js";
import { credentialsFromSecret } from "../credentials/index.js";
import { InMemoryTransport } from "../transport/index.js";
import { OPENAI_DESCRIPTOR, OpenAITransformer } from "../providers/index.js";
import { ProviderHandler } from "../handlers/index.js";
import { AuditLogger, createLogger } from "../observability/index.js";

const REQUEST = createCanonicalRequest({
  id: "req-bench",
  kind: "chat",
  model: "gpt-test",
  messages: [{ role: "user", content: "Write a hello world function." }],
  params: { temperature: 0.2, max_tokens: 64 },
});

const registry = new CapabilityRegistry();
registry.register(OPENAI_DESCRIPTOR);
registry.freeze();

const transformer = new OpenAITransformer();
const transport = new InMemoryTransport({
  replies: [
    {
      ok: true,
      status: 200,
      body: {
        model: "gpt-test",
        choices: [{ index: 0, message: { role: "assistant", content: "const x = 1;" }, finish_reason: "stop" }],
        usage: { prompt_tokens: 10, completion_tokens: 8, total_tokens: 18 },
      },
    },
  ],
});

const dispatcher = new Dispatcher({
  registry,
  handlers: {
    openai: new ProviderHandler({
      providerId: "openai",
      transformer,
      registry,
      transport,
      endpoint: "https://api.openai.test/v1",
      timeoutMs: 1000,
      maxTimeoutMs: 1000,
      logger: createLogger({ service: "bench", level: "silent" }),
    }),
  },
  audit: new AuditLogger({ write: () => undefined }),
});

const CREDS = credentialsFromSecret("bearer-token", "test-secret");

describe("Dispatcher throughput", () => {
  bench(
    "chat dispatch through an in-memory transport",
    async () => {
      await dispatcher.dispatch("openai", REQUEST, CREDS);
      // keep the recorded history from growing across iterations
      transport.sent.length = 0;
    },
    { time: 1000 },
  );

  bench(
    "outbound chat mapping only",
    () => {
      transformer.toProvider(REQUEST, "https://api.openai.test/v1");
    },
    { time: 1000 },
  );
});
