import { describe, expect, it } from "vitest";
import { encodeFrame, type StreamEvent } from "../protocol/index.js";
import { runAsk } from "./ask.js";

function fakeFetch(events: StreamEvent[], seen: string[] = []): typeof fetch {
  return async (input) => {
    seen.push(String(input));
    return new Response(events.map(encodeFrame).join(""), {
      status: 200,
      headers: { "Content-Type": "text/event-stream" },
    });
  };
}

describe("runAsk", () => {
  it("prints reasoning under a heading, then the answer", async () => {
    let output = "";
    const seen: string[] = [];

    const result = await runAsk({
      baseUrl: "http://127.0.0.1:9/",
      query: "hello",
      write: (text) => {
        output += text;
      },
      fetchImpl: fakeFetch(
        [
          { type: "reasoning", content: "let me " },
          { type: "reasoning", content: "see" },
          { type: "reasoning_done" },
          { type: "answer", content: "hi there" },
          { type: "complete", session_id: "s1" },
        ],
        seen,
      ),
    });

    expect(result).toEqual({ ok: true, sessionId: "s1" });
    expect(output).toBe("[thinking]\nlet me see\n\n[answer]\nhi there\n");
    expect(seen).toEqual(["http://127.0.0.1:9/chat/stream"]);
  });

  it("prints only the answer when there is no reasoning", async () => {
    let output = "";

    await runAsk({
      baseUrl: "http://127.0.0.1:9",
      query: "hello",
      write: (text) => {
        output += text;
      },
      fetchImpl: fakeFetch([
        { type: "answer", content: "plain" },
        { type: "complete", session_id: "s2" },
      ]),
    });

    expect(output).toBe("plain\n");
  });

  it("reports error frames and early disconnects", async () => {
    const write = () => undefined;

    expect(
      await runAsk({
        baseUrl: "http://127.0.0.1:9",
        query: "q",
        write,
        fetchImpl: fakeFetch([{ type: "error", message: "upstream down" }]),
      }),
    ).toEqual({ ok: false, message: "upstream down" });
    expect(
      await runAsk({
        baseUrl: "http://127.0.0.1:9",
        query: "q",
        write,
        fetchImpl: fakeFetch([{ type: "answer", content: "cut" }]),
      }),
    ).toEqual({ ok: false, message: "Stream ended before completion" });
  });
});
