import type { DebugListener } from "../chat-types.js";
import { IMPLICIT_DISCONNECT_MESSAGE, openChatStream, readStreamEvents } from "../client/index.js";
import { assertNever } from "../protocol/index.js";

export type AskOptions = {
  baseUrl: string;
  query: string;
  systemPrompt?: string;
  write: (text: string) => void;
  onDebug?: DebugListener;
  signal?: AbortSignal;
  fetchImpl?: typeof fetch;
};

export type AskResult = { ok: true; sessionId: string } | { ok: false; message: string };

/** Streams a single turn as plain text: reasoning first, then the answer. */
export async function runAsk(options: AskOptions): Promise<AskResult> {
  const body = await openChatStream({
    baseUrl: options.baseUrl,
    query: options.query,
    systemPrompt: options.systemPrompt,
    signal: options.signal,
    fetchImpl: options.fetchImpl,
  });

  let sawReasoning = false;
  for await (const event of readStreamEvents(body, { onDebug: options.onDebug })) {
    switch (event.type) {
      case "reasoning":
        if (!sawReasoning) {
          sawReasoning = true;
          options.write("[thinking]\n");
        }
        options.write(event.content);
        break;
      case "reasoning_done":
        options.write("\n\n[answer]\n");
        break;
      case "answer":
        options.write(event.content);
        break;
      case "complete":
        options.write("\n");
        return { ok: true, sessionId: event.session_id };
      case "error":
        return { ok: false, message: event.message };
      default:
        return assertNever(event);
    }
  }

  return { ok: false, message: IMPLICIT_DISCONNECT_MESSAGE };
}
