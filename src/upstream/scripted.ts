import { describeUpstream, type AppConfig } from "../config.js";
import { createAbortError } from "../errors.js";
import type { UpstreamModel, UpstreamRequest, UpstreamSignal } from "./types.js";

export type ScriptedUpstreamOptions = {
  script?: (request: UpstreamRequest) => UpstreamSignal[];
  delayMs?: number;
};

/**
 * Replays canned deltas with a small delay between them. Lets the server and
 * the terminal client run end to end without model credentials.
 */
export function createScriptedUpstream(config: AppConfig, options: ScriptedUpstreamOptions = {}): UpstreamModel {
  const script = options.script ?? buildDefaultScript;
  const delayMs = Math.max(0, options.delayMs ?? 40);
  return {
    description: describeUpstream({ ...config, provider: "scripted" }),
    open: (request) => replay(script(request), delayMs, request.signal),
  };
}

export function buildDefaultScript(request: UpstreamRequest): UpstreamSignal[] {
  const topic = request.query.length > 60 ? `${request.query.slice(0, 57)}...` : request.query;
  const reasoning = [
    "**Reading the question**\n\n",
    "The user asked",
    ` "${topic}".`,
    " I should",
    " break it",
    " into parts",
    " and answer",
    " each one",
    " in turn.",
  ];
  const answer = [
    "Here is",
    " a short",
    " answer:\n\n",
    "- the question",
    " was received\n",
    "- the reasoning",
    " streamed first",
  ];
  return [
    ...reasoning.map((text): UpstreamSignal => ({ kind: "delta", phase: "reasoning", text })),
    ...answer.map((text): UpstreamSignal => ({ kind: "delta", phase: "answer", text })),
    { kind: "completed" },
  ];
}

async function* replay(
  signals: UpstreamSignal[],
  delayMs: number,
  abortSignal?: AbortSignal,
): AsyncGenerator<UpstreamSignal, void, undefined> {
  for (const signal of signals) {
    if (delayMs > 0) {
      await sleep(delayMs, abortSignal);
    }
    if (abortSignal?.aborted) {
      throw createAbortError();
    }
    yield signal;
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(createAbortError());
  }
  return new Promise((resolve, reject) => {
    const handle = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(handle);
      cleanup();
      reject(createAbortError());
    };
    const cleanup = () => {
      signal?.removeEventListener("abort", onAbort);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
