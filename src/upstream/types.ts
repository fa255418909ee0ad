import type { UpstreamDescription } from "../config.js";

export type UpstreamPhase = "reasoning" | "answer";

export type UpstreamSignal =
  | { kind: "delta"; phase: UpstreamPhase; text: string }
  | { kind: "completed" }
  | { kind: "failed"; message: string };

export type UpstreamRequest = {
  query: string;
  systemPrompt: string;
  signal?: AbortSignal;
};

/**
 * A model completion source. `open` starts exactly one upstream request and
 * yields its deltas in order, ending with a terminal `completed` or `failed`
 * signal. Transport errors may also surface as a rejected iteration.
 */
export interface UpstreamModel {
  readonly description: UpstreamDescription;
  open(request: UpstreamRequest): AsyncIterable<UpstreamSignal>;
}
