import OpenAI, { AzureOpenAI } from "openai";
import type { AppConfig, ReasoningEffortLevel, ReasoningSummaryMode } from "../config.js";
import { describeUpstream } from "../config.js";
import { ConfigError } from "../errors.js";
import type { UpstreamModel, UpstreamRequest, UpstreamSignal } from "./types.js";

export type ResponsesStreamParams = {
  model: string;
  input: Array<{ role: "system" | "user"; content: string }>;
  reasoning: {
    effort: ReasoningEffortLevel;
    summary: ReasoningSummaryMode;
  };
};

// Structural view of a Responses API stream event; only the fields read here.
export type ResponseStreamEventLike = {
  type: string;
  delta?: unknown;
  message?: unknown;
  response?: unknown;
  summary_index?: unknown;
};

export type ResponsesEventSource = (
  params: ResponsesStreamParams,
  signal?: AbortSignal,
) => Promise<AsyncIterable<ResponseStreamEventLike>>;

export function createResponsesClient(config: AppConfig): OpenAI {
  if (config.provider === "azure") {
    const apiKey = config.azure.apiKey.trim();
    const endpoint = config.azure.endpoint.trim();
    if (!apiKey || !endpoint) {
      throw new ConfigError("Missing Azure OpenAI credentials. Set AZURE_OPENAI_API_KEY and AZURE_OPENAI_ENDPOINT.");
    }
    return new AzureOpenAI({
      apiKey,
      endpoint,
      apiVersion: config.azure.apiVersion,
      deployment: config.azure.deployment,
    });
  }

  const apiKey = config.openai.apiKey.trim();
  if (!apiKey) {
    throw new ConfigError("Missing OpenAI API key. Set OPENAI_API_KEY.");
  }
  return new OpenAI({
    apiKey,
    baseURL: config.openai.baseUrl ?? undefined,
  });
}

export function createResponsesEventSource(client: OpenAI): ResponsesEventSource {
  return async (params, signal) =>
    client.responses.create(
      {
        model: params.model,
        input: params.input,
        reasoning: params.reasoning,
        stream: true,
      },
      { signal },
    );
}

export function createOpenAiUpstream(
  config: AppConfig,
  source: ResponsesEventSource = createResponsesEventSource(createResponsesClient(config)),
): UpstreamModel {
  const description = describeUpstream(config);
  return {
    description,
    open: (request) =>
      streamResponseSignals(source, {
        model: description.model,
        input: [
          { role: "system", content: request.systemPrompt },
          { role: "user", content: request.query },
        ],
        reasoning: {
          effort: config.reasoningEffort,
          summary: config.reasoningSummary,
        },
      }, request),
  };
}

async function* streamResponseSignals(
  source: ResponsesEventSource,
  params: ResponsesStreamParams,
  request: UpstreamRequest,
): AsyncGenerator<UpstreamSignal, void, undefined> {
  const stream = await source(params, request.signal);
  for await (const event of stream) {
    const signal = classifyResponseEvent(event);
    if (!signal) {
      continue;
    }
    yield signal;
    if (signal.kind !== "delta") {
      return;
    }
  }
}

function classifyResponseEvent(event: ResponseStreamEventLike): UpstreamSignal | null {
  switch (event.type) {
    case "response.reasoning_summary_text.delta":
    case "response.reasoning_text.delta":
      return typeof event.delta === "string" && event.delta
        ? { kind: "delta", phase: "reasoning", text: event.delta }
        : null;
    case "response.reasoning_summary_part.added":
      // Later summary parts start a new paragraph of the same reasoning text.
      return typeof event.summary_index === "number" && event.summary_index > 0
        ? { kind: "delta", phase: "reasoning", text: "\n\n" }
        : null;
    case "response.output_text.delta":
      return typeof event.delta === "string" && event.delta
        ? { kind: "delta", phase: "answer", text: event.delta }
        : null;
    case "response.completed":
      return { kind: "completed" };
    case "response.failed":
      return { kind: "failed", message: readResponseErrorMessage(event.response) ?? "response failed" };
    case "response.incomplete":
      return { kind: "failed", message: `response incomplete: ${readIncompleteReason(event.response) ?? "unknown reason"}` };
    case "error":
      return {
        kind: "failed",
        message: typeof event.message === "string" && event.message.trim() ? event.message.trim() : "unknown stream error",
      };
    default:
      return null;
  }
}

function readResponseErrorMessage(response: unknown): string | null {
  if (!isRecord(response) || !isRecord(response.error)) {
    return null;
  }
  const message = response.error.message;
  return typeof message === "string" && message.trim() ? message.trim() : null;
}

function readIncompleteReason(response: unknown): string | null {
  if (!isRecord(response) || !isRecord(response.incomplete_details)) {
    return null;
  }
  const reason = response.incomplete_details.reason;
  return typeof reason === "string" && reason ? reason : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const __openAiInternals = {
  classifyResponseEvent,
};
