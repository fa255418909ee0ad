import { assertNever, type StreamEvent } from "./events.js";

export const SSE_DATA_PREFIX = "data: ";
export const SSE_FRAME_TERMINATOR = "\n\n";

/**
 * One event, one frame: `data: <json>\n\n`. JSON escapes every newline inside
 * `content`, so a frame never carries an embedded blank line.
 */
export function encodeFrame(event: StreamEvent): string {
  return `${SSE_DATA_PREFIX}${JSON.stringify(toWirePayload(event))}${SSE_FRAME_TERMINATOR}`;
}

// Comment frame; readers drop lines without the data prefix.
export function encodeKeepAlive(): string {
  return `: keep-alive${SSE_FRAME_TERMINATOR}`;
}

function toWirePayload(event: StreamEvent): Record<string, string> {
  switch (event.type) {
    case "reasoning":
    case "answer":
      return { type: event.type, content: event.content };
    case "reasoning_done":
      return { type: event.type };
    case "complete":
      return { type: event.type, session_id: event.session_id };
    case "error":
      return { type: event.type, message: event.message };
    default:
      return assertNever(event);
  }
}
