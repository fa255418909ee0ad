import { describe, expect, it, vi } from "vitest";
import type { DebugEvent } from "../chat-types.js";
import { StreamDecoder, decodeStreamLine } from "./decoder.js";

describe("decodeStreamLine", () => {
  it("reports invalid JSON without throwing", () => {
    const result = decodeStreamLine('data: {"type":"answer",');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason.startsWith("invalid JSON: ")).toBe(true);
    }
  });

  it("rejects lines without the data prefix", () => {
    expect(decodeStreamLine('{"type":"reasoning_done"}')).toEqual({ ok: false, reason: "line is not a data frame" });
  });
});

describe("StreamDecoder", () => {
  it("skips a corrupt frame and keeps decoding later frames", () => {
    const onMalformed = vi.fn();
    const decoder = new StreamDecoder({ onMalformed });
    const lines = [
      'data: {"type":"reasoning","content":"A"}',
      "data: {not json}",
      'data: {"type":"answer"}',
      'data: {"type":"answer","content":"C"}',
      'data: {"type":"complete","session_id":"s1"}',
    ];

    const events = lines.map((line) => decoder.decode(line));

    expect(events).toEqual([
      { type: "reasoning", content: "A" },
      null,
      null,
      { type: "answer", content: "C" },
      { type: "complete", session_id: "s1" },
    ]);
    expect(decoder.malformedCount).toBe(2);
    expect(onMalformed).toHaveBeenCalledTimes(2);
    expect(onMalformed).toHaveBeenLastCalledWith("answer event missing content", 'data: {"type":"answer"}');
  });

  it("reports malformed frames to the debug listener", () => {
    const debugEvents: DebugEvent[] = [];
    const decoder = new StreamDecoder({
      onMalformed: () => undefined,
      onDebug: (event) => debugEvents.push(event),
    });

    expect(decoder.decode('data: {"type":"unknown"}')).toBeNull();
    expect(debugEvents).toEqual([
      {
        stage: "frame_malformed",
        data: {
          reason: 'unknown event type: "unknown"',
          line: 'data: {"type":"unknown"}',
          malformedCount: 1,
        },
      },
    ]);
  });

  it("warns on the console when no handler is given", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const decoder = new StreamDecoder();

    expect(decoder.decode("data: [")).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0]).startsWith("[thinkstream] skipped malformed stream frame (invalid JSON")).toBe(
      true,
    );
    warn.mockRestore();
  });

  it("decodes an error event as a normal event", () => {
    const decoder = new StreamDecoder({ onMalformed: () => undefined });
    expect(decoder.decode('data: {"type":"error","message":"upstream timeout"}')).toEqual({
      type: "error",
      message: "upstream timeout",
    });
  });
});
