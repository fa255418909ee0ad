import { ConfigError } from "./errors.js";

export type UpstreamProvider = "azure" | "openai" | "scripted";
export type ReasoningEffortLevel = "low" | "medium" | "high";
export type ReasoningSummaryMode = "auto" | "concise" | "detailed";

export type AppConfig = {
  provider: UpstreamProvider;
  azure: {
    apiKey: string;
    endpoint: string;
    deployment: string;
    apiVersion: string;
  };
  openai: {
    apiKey: string;
    baseUrl: string | null;
    model: string;
  };
  reasoningEffort: ReasoningEffortLevel;
  reasoningSummary: ReasoningSummaryMode;
  systemPrompt: string;
  complianceLogDir: string;
  complianceLoggingEnabled: boolean;
  host: string;
  port: number;
  debug: boolean;
};

export type UpstreamDescription = {
  provider: UpstreamProvider;
  model: string;
  apiVersion: string | null;
  endpoint: string | null;
};

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant. Show your thinking process step by step.";

const DEFAULT_MODEL = "gpt-5-nano";
const DEFAULT_AZURE_API_VERSION = "2025-03-01-preview";
const DEFAULT_PORT = 8000;

const PROVIDERS: UpstreamProvider[] = ["azure", "openai", "scripted"];
const EFFORT_LEVELS: ReasoningEffortLevel[] = ["low", "medium", "high"];
const SUMMARY_MODES: ReasoningSummaryMode[] = ["auto", "concise", "detailed"];

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const azureEndpoint = readEnv(env, "AZURE_OPENAI_ENDPOINT");
  const openAiApiKey = readEnv(env, "OPENAI_API_KEY");

  return {
    provider: readChoice(env, "THINKSTREAM_PROVIDER", PROVIDERS) ?? inferProvider(azureEndpoint, openAiApiKey),
    azure: {
      apiKey: readEnv(env, "AZURE_OPENAI_API_KEY"),
      endpoint: azureEndpoint,
      deployment: readEnv(env, "AZURE_OPENAI_MODEL_DEPLOYMENT") || DEFAULT_MODEL,
      apiVersion: readEnv(env, "AZURE_OPENAI_API_VERSION") || DEFAULT_AZURE_API_VERSION,
    },
    openai: {
      apiKey: openAiApiKey,
      baseUrl: readEnv(env, "OPENAI_BASE_URL") || null,
      model: readEnv(env, "OPENAI_MODEL") || DEFAULT_MODEL,
    },
    reasoningEffort: readChoice(env, "REASONING_EFFORT", EFFORT_LEVELS) ?? "medium",
    reasoningSummary: readChoice(env, "REASONING_SUMMARY", SUMMARY_MODES) ?? "detailed",
    systemPrompt: readEnv(env, "THINKSTREAM_SYSTEM_PROMPT") || DEFAULT_SYSTEM_PROMPT,
    complianceLogDir: readEnv(env, "COMPLIANCE_LOG_DIR") || "compliance_logs",
    complianceLoggingEnabled: (readEnv(env, "ENABLE_COMPLIANCE_LOGGING") || "true").toLowerCase() === "true",
    host: readEnv(env, "HOST") || "0.0.0.0",
    port: readPort(env, "PORT") ?? DEFAULT_PORT,
    debug: isTruthy(readEnv(env, "THINKSTREAM_DEBUG")),
  };
}

/** Throws a {@link ConfigError} naming every variable the provider still needs. */
export function assertUpstreamCredentials(config: AppConfig): void {
  const missing: string[] = [];
  if (config.provider === "azure") {
    if (!config.azure.apiKey) {
      missing.push("AZURE_OPENAI_API_KEY");
    }
    if (!config.azure.endpoint) {
      missing.push("AZURE_OPENAI_ENDPOINT");
    }
  } else if (config.provider === "openai" && !config.openai.apiKey) {
    missing.push("OPENAI_API_KEY");
  }

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }
}

export function describeUpstream(config: AppConfig): UpstreamDescription {
  switch (config.provider) {
    case "azure":
      return {
        provider: "azure",
        model: config.azure.deployment,
        apiVersion: config.azure.apiVersion,
        endpoint: config.azure.endpoint || null,
      };
    case "openai":
      return {
        provider: "openai",
        model: config.openai.model,
        apiVersion: null,
        endpoint: config.openai.baseUrl,
      };
    case "scripted":
      return {
        provider: "scripted",
        model: "scripted",
        apiVersion: null,
        endpoint: null,
      };
  }
}

function inferProvider(azureEndpoint: string, openAiApiKey: string): UpstreamProvider {
  if (azureEndpoint) {
    return "azure";
  }
  return openAiApiKey ? "openai" : "scripted";
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string {
  return env[key]?.trim() ?? "";
}

function readChoice<T extends string>(env: NodeJS.ProcessEnv, key: string, choices: readonly T[]): T | undefined {
  const raw = readEnv(env, key).toLowerCase();
  if (!raw) {
    return undefined;
  }
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new ConfigError(`${key} must be one of ${choices.join(", ")} (got "${raw}")`);
  }
  return match;
}

function readPort(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = readEnv(env, key);
  if (!raw) {
    return undefined;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ConfigError(`${key} must be a port number (got "${raw}")`);
  }
  return port;
}

function isTruthy(value: string): boolean {
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}
