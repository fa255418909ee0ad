import type { AppConfig } from "../config.js";
import { createOpenAiUpstream } from "./openai.js";
import { createScriptedUpstream } from "./scripted.js";
import type { UpstreamModel } from "./types.js";

export function createUpstream(config: AppConfig): UpstreamModel {
  return config.provider === "scripted" ? createScriptedUpstream(config) : createOpenAiUpstream(config);
}

export { createOpenAiUpstream, createResponsesClient, createResponsesEventSource } from "./openai.js";
export type { ResponsesEventSource, ResponsesStreamParams, ResponseStreamEventLike } from "./openai.js";
export { buildDefaultScript, createScriptedUpstream, type ScriptedUpstreamOptions } from "./scripted.js";
export type { UpstreamModel, UpstreamPhase, UpstreamRequest, UpstreamSignal } from "./types.js";
