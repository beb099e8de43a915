import type { ProviderStreamEvent } from "./transport.js";

interface SseState {
  event: string;
  data: string[];
}

type LineOutcome = { kind: "none" } | { kind: "dispatch"; event: ProviderStreamEvent } | { kind: "done" };

function processLine(rawLine: string, state: SseState): LineOutcome {
  const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

  // Blank line ends the event
  if (line === "") {
    if (state.data.length === 0) {
      state.event = "";
      return { kind: "none" };
    }
    const data = state.data.join("\n");
    const event: ProviderStreamEvent = state.event ? { event: state.event, data } : { data };
    state.event = "";
    state.data = [];
    return data === "[DONE]" ? { kind: "done" } : { kind: "dispatch", event };
  }

  if (line.startsWith(":")) return { kind: "none" };

  const colon = line.indexOf(":");
  const field = colon === -1 ? line : line.slice(0, colon);
  const value = colon === -1 ? "" : line.slice(colon + 1).replace(/^ /, "");

  if (field === "event") state.event = value;
  else if (field === "data") state.data.push(value);
  return { kind: "none" };
}

/**
 * Splits a text stream into server-sent events. A `[DONE]` payload ends the
 * sequence; comments and unknown fields are skipped.
 */
export async function* parseSse(chunks: AsyncIterable<string>): AsyncGenerator<ProviderStreamEvent> {
  const state: SseState = { event: "", data: [] };
  let buffer = "";

  for await (const chunk of chunks) {
    buffer += chunk;
    const lines = buffer.split("\n");
    buffer = lines.pop() ?? "";
    for (const line of lines) {
      const outcome = processLine(line, state);
      if (outcome.kind === "done") return;
      if (outcome.kind === "dispatch") yield outcome.event;
    }
  }

  // Flush a final event that was not followed by a blank line
  for (const line of [buffer, ""]) {
    const outcome = processLine(line, state);
    if (outcome.kind === "done") return;
    if (outcome.kind === "dispatch") yield outcome.event;
  }
}
