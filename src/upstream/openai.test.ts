import { describe, expect, it } from "vitest";
import { loadAppConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import {
  __openAiInternals,
  createOpenAiUpstream,
  createResponsesClient,
  type ResponseStreamEventLike,
  type ResponsesStreamParams,
} from "./openai.js";
import type { UpstreamSignal } from "./types.js";

const { classifyResponseEvent } = __openAiInternals;

const openAiConfig = loadAppConfig({
  OPENAI_API_KEY: "test-key",
  OPENAI_MODEL: "test-model",
  REASONING_EFFORT: "low",
  REASONING_SUMMARY: "concise",
});

async function* eventsOf(events: ResponseStreamEventLike[]): AsyncGenerator<ResponseStreamEventLike> {
  yield* events;
}

async function collect(signals: AsyncIterable<UpstreamSignal>): Promise<UpstreamSignal[]> {
  const collected: UpstreamSignal[] = [];
  for await (const signal of signals) {
    collected.push(signal);
  }
  return collected;
}

describe("classifyResponseEvent", () => {
  it("maps reasoning summary and answer deltas to phases", () => {
    expect(classifyResponseEvent({ type: "response.reasoning_summary_text.delta", delta: "plan" })).toEqual({
      kind: "delta",
      phase: "reasoning",
      text: "plan",
    });
    expect(classifyResponseEvent({ type: "response.reasoning_text.delta", delta: "raw" })).toEqual({
      kind: "delta",
      phase: "reasoning",
      text: "raw",
    });
    expect(classifyResponseEvent({ type: "response.output_text.delta", delta: "hi" })).toEqual({
      kind: "delta",
      phase: "answer",
      text: "hi",
    });
  });

  it("separates later reasoning summary parts with a blank line", () => {
    expect(classifyResponseEvent({ type: "response.reasoning_summary_part.added", summary_index: 0 })).toBeNull();
    expect(classifyResponseEvent({ type: "response.reasoning_summary_part.added", summary_index: 2 })).toEqual({
      kind: "delta",
      phase: "reasoning",
      text: "\n\n",
    });
  });

  it("ignores empty deltas and unrelated events", () => {
    expect(classifyResponseEvent({ type: "response.output_text.delta", delta: "" })).toBeNull();
    expect(classifyResponseEvent({ type: "response.output_text.delta", delta: 3 })).toBeNull();
    expect(classifyResponseEvent({ type: "response.created" })).toBeNull();
    expect(classifyResponseEvent({ type: "response.output_text.done" })).toBeNull();
  });

  it("maps terminal events", () => {
    expect(classifyResponseEvent({ type: "response.completed" })).toEqual({ kind: "completed" });
    expect(
      classifyResponseEvent({ type: "response.failed", response: { error: { message: " rate limited " } } }),
    ).toEqual({ kind: "failed", message: "rate limited" });
    expect(classifyResponseEvent({ type: "response.failed", response: {} })).toEqual({
      kind: "failed",
      message: "response failed",
    });
    expect(
      classifyResponseEvent({
        type: "response.incomplete",
        response: { incomplete_details: { reason: "max_output_tokens" } },
      }),
    ).toEqual({ kind: "failed", message: "response incomplete: max_output_tokens" });
    expect(classifyResponseEvent({ type: "response.incomplete" })).toEqual({
      kind: "failed",
      message: "response incomplete: unknown reason",
    });
    expect(classifyResponseEvent({ type: "error", message: "bad request" })).toEqual({
      kind: "failed",
      message: "bad request",
    });
    expect(classifyResponseEvent({ type: "error" })).toEqual({ kind: "failed", message: "unknown stream error" });
  });
});

describe("createOpenAiUpstream", () => {
  it("sends the system prompt, query and reasoning settings", async () => {
    const calls: ResponsesStreamParams[] = [];
    const upstream = createOpenAiUpstream(openAiConfig, async (params) => {
      calls.push(params);
      return eventsOf([{ type: "response.completed" }]);
    });

    await collect(upstream.open({ query: "why?", systemPrompt: "think first" }));

    expect(upstream.description).toEqual({ provider: "openai", model: "test-model", apiVersion: null, endpoint: null });
    expect(calls).toEqual([
      {
        model: "test-model",
        input: [
          { role: "system", content: "think first" },
          { role: "user", content: "why?" },
        ],
        reasoning: { effort: "low", summary: "concise" },
      },
    ]);
  });

  it("yields deltas in order and stops at the first terminal event", async () => {
    const upstream = createOpenAiUpstream(openAiConfig, async () =>
      eventsOf([
        { type: "response.created" },
        { type: "response.reasoning_summary_text.delta", delta: "a" },
        { type: "response.output_text.delta", delta: "b" },
        { type: "response.completed" },
        { type: "response.output_text.delta", delta: "ignored" },
      ]),
    );

    expect(await collect(upstream.open({ query: "q", systemPrompt: "p" }))).toEqual([
      { kind: "delta", phase: "reasoning", text: "a" },
      { kind: "delta", phase: "answer", text: "b" },
      { kind: "completed" },
    ]);
  });

  it("passes the abort signal to the event source", async () => {
    const controller = new AbortController();
    let received: AbortSignal | undefined;
    const upstream = createOpenAiUpstream(openAiConfig, async (_params, signal) => {
      received = signal;
      return eventsOf([]);
    });

    await collect(upstream.open({ query: "q", systemPrompt: "p", signal: controller.signal }));

    expect(received).toBe(controller.signal);
  });
});

describe("createResponsesClient", () => {
  it("requires credentials for the selected provider", () => {
    expect(() => createResponsesClient(loadAppConfig({ THINKSTREAM_PROVIDER: "openai" }))).toThrow(ConfigError);
    expect(() => createResponsesClient(loadAppConfig({ THINKSTREAM_PROVIDER: "azure" }))).toThrow(
      "Missing Azure OpenAI credentials. Set AZURE_OPENAI_API_KEY and AZURE_OPENAI_ENDPOINT.",
    );
  });
});
