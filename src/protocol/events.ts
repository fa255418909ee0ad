export const STREAM_EVENT_TYPES = ["reasoning", "reasoning_done", "answer", "complete", "error"] as const;

export type StreamEventType = (typeof STREAM_EVENT_TYPES)[number];

export type ReasoningEvent = { type: "reasoning"; content: string };
export type ReasoningDoneEvent = { type: "reasoning_done" };
export type AnswerEvent = { type: "answer"; content: string };
export type CompleteEvent = { type: "complete"; session_id: string };
export type ErrorEvent = { type: "error"; message: string };

export type StreamEvent = ReasoningEvent | ReasoningDoneEvent | AnswerEvent | CompleteEvent | ErrorEvent;

export type TerminalStreamEvent = CompleteEvent | ErrorEvent;

export type StreamEventParseResult =
  | { ok: true; event: StreamEvent }
  | { ok: false; reason: string };

export const DEFAULT_STREAM_ERROR_MESSAGE = "Streaming error occurred";

export function isStreamEventType(value: unknown): value is StreamEventType {
  return typeof value === "string" && STREAM_EVENT_TYPES.some((candidate) => candidate === value);
}

export function isTerminalEvent(event: StreamEvent): event is TerminalStreamEvent {
  return event.type === "complete" || event.type === "error";
}

/**
 * Validates a decoded JSON payload against the event vocabulary. Only the
 * fields that belong to the variant are kept, so extra keys sent by a newer
 * server never leak into client state.
 */
export function parseStreamEvent(value: unknown): StreamEventParseResult {
  if (!isRecord(value)) {
    return { ok: false, reason: "payload is not an object" };
  }

  const type = value.type;
  if (!isStreamEventType(type)) {
    return { ok: false, reason: `unknown event type: ${describeValue(type)}` };
  }

  switch (type) {
    case "reasoning":
    case "answer": {
      if (typeof value.content !== "string") {
        return { ok: false, reason: `${type} event missing content` };
      }
      return { ok: true, event: { type, content: value.content } };
    }
    case "reasoning_done":
      return { ok: true, event: { type } };
    case "complete": {
      if (typeof value.session_id !== "string") {
        return { ok: false, reason: "complete event missing session_id" };
      }
      return { ok: true, event: { type, session_id: value.session_id } };
    }
    case "error": {
      const message = typeof value.message === "string" && value.message.trim()
        ? value.message
        : DEFAULT_STREAM_ERROR_MESSAGE;
      return { ok: true, event: { type, message } };
    }
    default:
      return assertNever(type);
  }
}

export function assertNever(value: never): never {
  throw new Error(`unhandled stream event variant: ${describeValue(value)}`);
}

function describeValue(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  return value === undefined ? "undefined" : typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
