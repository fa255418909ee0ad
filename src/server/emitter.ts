import { randomBytes } from "node:crypto";
import type { DebugListener } from "../chat-types.js";
import { isAbortError, summarizeError } from "../errors.js";
import { logWarning } from "../log.js";
import { assertNever, type StreamEvent } from "../protocol/index.js";
import type { UpstreamModel } from "../upstream/index.js";
import { countWords, type AuditSink, type ComplianceRecord } from "./compliance-log.js";

export const UPSTREAM_ENDED_EARLY_MESSAGE = "Upstream stream ended without a completion signal";

export type ChainOfThoughtRequest = {
  query: string;
  systemPrompt: string;
};

export type EmitterOptions = {
  sessionId: string;
  upstream: UpstreamModel;
  audit: AuditSink;
  send: (event: StreamEvent) => void;
  signal?: AbortSignal;
  onDebug?: DebugListener;
  now?: () => Date;
};

export type EmitterOutcome = {
  sessionId: string;
  status: "complete" | "error" | "aborted";
  reasoning: string;
  answer: string;
  errorMessage: string | null;
  eventCount: number;
};

export function createSessionId(now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `session_${date}_${time}_${randomBytes(3).toString("hex")}`;
}

/**
 * Drives one upstream completion and translates it into stream events:
 * reasoning deltas, a single `reasoning_done` at the phase switch, answer
 * deltas, then exactly one `complete` or `error`. Each event is written to
 * the audit sink before it is sent.
 */
export async function runChainOfThoughtStream(
  request: ChainOfThoughtRequest,
  options: EmitterOptions,
): Promise<EmitterOutcome> {
  const now = options.now ?? (() => new Date());
  const { sessionId, audit } = options;
  let sequence = 0;
  let reasoning = "";
  let answer = "";
  let reasoningClosed = false;

  const record = (entry: ComplianceRecord) => {
    try {
      audit.append(entry);
    } catch (error) {
      logWarning(`audit sink rejected a record for ${sessionId}: ${summarizeError(error)}`);
    }
  };

  const emit = (event: StreamEvent) => {
    record({
      event_type: event.type,
      timestamp: now().toISOString(),
      session_id: sessionId,
      content: eventContent(event),
      sequence_number: sequence,
    });
    sequence += 1;
    options.send(event);
  };

  const closeReasoning = () => {
    if (reasoning && !reasoningClosed) {
      reasoningClosed = true;
      emit({ type: "reasoning_done" });
    }
  };

  const finish = (status: EmitterOutcome["status"], errorMessage: string | null = null): EmitterOutcome => {
    options.onDebug?.({
      stage: "stream_finished",
      data: {
        sessionId,
        status,
        eventCount: sequence,
        reasoningChars: reasoning.length,
        answerChars: answer.length,
      },
    });
    return { sessionId, status, reasoning, answer, errorMessage, eventCount: sequence };
  };

  const fail = (message: string): EmitterOutcome => {
    emit({ type: "error", message });
    return finish("error", message);
  };

  const description = options.upstream.description;
  record({
    event_type: "session_start",
    session_id: sessionId,
    start_time: now().toISOString(),
    model: description.model,
    api_version: description.apiVersion,
    endpoint: description.endpoint,
    user_query: request.query,
  });

  try {
    const upstreamSignals = options.upstream.open({
      query: request.query,
      systemPrompt: request.systemPrompt,
      signal: options.signal,
    });

    for await (const signal of upstreamSignals) {
      if (options.signal?.aborted) {
        return finish("aborted");
      }

      switch (signal.kind) {
        case "delta": {
          if (!signal.text) {
            continue;
          }
          if (signal.phase === "reasoning") {
            if (reasoningClosed || answer) {
              // Reasoning after the answer began would break the phase order.
              options.onDebug?.({ stage: "late_reasoning_dropped", data: { sessionId, chars: signal.text.length } });
              continue;
            }
            reasoning += signal.text;
            emit({ type: "reasoning", content: signal.text });
          } else {
            closeReasoning();
            answer += signal.text;
            emit({ type: "answer", content: signal.text });
          }
          continue;
        }
        case "completed": {
          closeReasoning();
          emit({ type: "complete", session_id: sessionId });
          record({
            event_type: "session_complete",
            timestamp: now().toISOString(),
            session_id: sessionId,
            reasoning_word_count: countWords(reasoning),
            answer_word_count: countWords(answer),
            total_reasoning_text: reasoning,
            total_answer_text: answer,
          });
          return finish("complete");
        }
        case "failed":
          return fail(signal.message);
        default:
          return assertNever(signal);
      }
    }
  } catch (error) {
    if (options.signal?.aborted || isAbortError(error)) {
      return finish("aborted");
    }
    options.onDebug?.({ stage: "upstream_error", data: { sessionId, error: summarizeError(error) } });
    return fail(summarizeError(error));
  }

  if (options.signal?.aborted) {
    return finish("aborted");
  }
  return fail(UPSTREAM_ENDED_EARLY_MESSAGE);
}

function eventContent(event: StreamEvent): string {
  switch (event.type) {
    case "reasoning":
    case "answer":
      return event.content;
    case "error":
      return event.message;
    case "complete":
    case "reasoning_done":
      return "";
    default:
      return assertNever(event);
  }
}
