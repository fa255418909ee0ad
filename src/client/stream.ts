import type { DebugListener } from "../chat-types.js";
import { summarizeError } from "../errors.js";
import { SseLineReassembler, StreamDecoder, type MalformedFrameHandler, type StreamEvent } from "../protocol/index.js";

export type ReadStreamEventsOptions = {
  onDebug?: DebugListener;
  onMalformed?: MalformedFrameHandler;
};

/**
 * Reads a response body as stream events. The next chunk is only requested
 * after every event decoded from the current one has been consumed, so a slow
 * consumer sees each increment on its own instead of a merged batch.
 */
export async function* readStreamEvents(
  body: ReadableStream<Uint8Array>,
  options: ReadStreamEventsOptions = {},
): AsyncGenerator<StreamEvent, void, undefined> {
  const reader = body.getReader();
  const reassembler = new SseLineReassembler();
  const decoder = new StreamDecoder({
    onDebug: options.onDebug,
    onMalformed: options.onMalformed,
  });
  let finished = false;

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        finished = true;
        break;
      }

      for (const line of reassembler.push(value)) {
        const event = decoder.decode(line);
        if (event) {
          yield event;
        }
      }
    }

    const tail = reassembler.finish();
    if (tail.trim()) {
      options.onDebug?.({
        stage: "stream_truncated",
        data: {
          discardedChars: tail.length,
          fragment: tail.slice(0, 120),
        },
      });
    }
  } finally {
    if (!finished) {
      await cancelReader(reader, options.onDebug);
    }
    reader.releaseLock();
  }
}

async function cancelReader(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  onDebug?: DebugListener,
): Promise<void> {
  try {
    await reader.cancel();
  } catch (error) {
    onDebug?.({
      stage: "stream_cancel_failed",
      data: { error: summarizeError(error) },
    });
  }
}
