import type { DebugListener } from "../chat-types.js";
import { summarizeError } from "../errors.js";
import { logWarning } from "../log.js";
import { parseStreamEvent, type StreamEvent, type StreamEventParseResult } from "./events.js";
import { SSE_DATA_PREFIX } from "./frame.js";

const LINE_PREVIEW_CHARS = 120;

export function decodeStreamLine(line: string): StreamEventParseResult {
  if (!line.startsWith(SSE_DATA_PREFIX)) {
    return { ok: false, reason: "line is not a data frame" };
  }

  const payload = line.slice(SSE_DATA_PREFIX.length);
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${summarizeError(error)}` };
  }

  return parseStreamEvent(parsed);
}

export type MalformedFrameHandler = (reason: string, line: string) => void;

/**
 * Fail-soft wrapper around {@link decodeStreamLine}: a corrupt frame is
 * reported and skipped, and the next line decodes as if nothing happened.
 */
export class StreamDecoder {
  private malformed = 0;
  private readonly onMalformed: MalformedFrameHandler;
  private readonly onDebug?: DebugListener;

  constructor(options: { onMalformed?: MalformedFrameHandler; onDebug?: DebugListener } = {}) {
    this.onMalformed = options.onMalformed ?? warnMalformedFrame;
    this.onDebug = options.onDebug;
  }

  get malformedCount(): number {
    return this.malformed;
  }

  decode(line: string): StreamEvent | null {
    const result = decodeStreamLine(line);
    if (result.ok) {
      return result.event;
    }

    this.malformed += 1;
    const preview = line.slice(0, LINE_PREVIEW_CHARS);
    this.onDebug?.({
      stage: "frame_malformed",
      data: {
        reason: result.reason,
        line: preview,
        malformedCount: this.malformed,
      },
    });
    this.onMalformed(result.reason, preview);
    return null;
  }
}

function warnMalformedFrame(reason: string, line: string): void {
  logWarning(`skipped malformed stream frame (${reason}): ${line}`);
}
