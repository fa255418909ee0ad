#!/usr/bin/env node
import { assertUpstreamCredentials, loadAppConfig, type AppConfig, type UpstreamProvider } from "./config.js";
import { ChatSessionStore, DEFAULT_API_BASE_URL, openChatStream } from "./client/index.js";
import { parseArgs, type ParsedArgs } from "./cli/args.js";
import { runAsk } from "./cli/ask.js";
import { startChatApp } from "./cli/app.js";
import { ConfigError, summarizeError } from "./errors.js";
import { createConsoleDebugListener, logInfo, logWarning } from "./log.js";
import { startChatServer } from "./server/index.js";
import { createUpstream } from "./upstream/index.js";

const USAGE = [
  "usage:",
  "  thinkstream serve [--host HOST] [--port PORT] [--provider azure|openai|scripted]",
  "  thinkstream chat [--url URL] [--system PROMPT]",
  "  thinkstream ask \"<query>\" [--url URL] [--system PROMPT]",
].join("\n");

async function runServe(args: ParsedArgs, config: AppConfig): Promise<void> {
  const effective: AppConfig = {
    ...config,
    provider: readProviderFlag(args) ?? config.provider,
    host: args.flags.get("host") ?? config.host,
    port: readPortFlag(args) ?? config.port,
  };
  assertUpstreamCredentials(effective);

  const running = await startChatServer({
    config: effective,
    upstream: createUpstream(effective),
    onDebug: createConsoleDebugListener(effective.debug),
  });
  logInfo(`listening on ${running.url} (provider: ${effective.provider})`);

  const shutdown = () => {
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logWarning(`shutdown failed: ${summarizeError(error)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

async function runChat(args: ParsedArgs, config: AppConfig): Promise<void> {
  const baseUrl = args.flags.get("url") ?? DEFAULT_API_BASE_URL;
  const store = new ChatSessionStore({
    systemPrompt: args.flags.get("system"),
    onDebug: createConsoleDebugListener(config.debug),
    transport: (request) => openChatStream({ baseUrl, ...request }),
  });
  await startChatApp({ store, serverUrl: baseUrl });
}

async function runAskCommand(args: ParsedArgs, config: AppConfig): Promise<number> {
  const query = args.positionals.join(" ").trim();
  if (!query) {
    console.error(USAGE);
    return 2;
  }
  const result = await runAsk({
    baseUrl: args.flags.get("url") ?? DEFAULT_API_BASE_URL,
    query,
    systemPrompt: args.flags.get("system"),
    write: (text) => {
      process.stdout.write(text);
    },
    onDebug: createConsoleDebugListener(config.debug),
  });
  if (!result.ok) {
    console.error(`\nerror: ${result.message}`);
    return 1;
  }
  return 0;
}

function readPortFlag(args: ParsedArgs): number | undefined {
  const raw = args.flags.get("port");
  if (raw === undefined) {
    return undefined;
  }
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ConfigError(`--port must be a port number (got "${raw}")`);
  }
  return port;
}

function readProviderFlag(args: ParsedArgs): UpstreamProvider | undefined {
  const raw = args.flags.get("provider");
  if (raw === undefined) {
    return undefined;
  }
  if (raw === "azure" || raw === "openai" || raw === "scripted") {
    return raw;
  }
  throw new ConfigError(`--provider must be one of azure, openai, scripted (got "${raw}")`);
}

async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  const config = loadAppConfig();
  switch (args.command) {
    case "serve":
      await runServe(args, config);
      return 0;
    case "chat":
      await runChat(args, config);
      return 0;
    case "ask":
      return runAskCommand(args, config);
    case "help":
    case "--help":
      console.log(USAGE);
      return 0;
    default:
      console.error(`unknown command: ${args.command}\n${USAGE}`);
      return 2;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== 0) {
      process.exitCode = code;
    }
  },
  (error: unknown) => {
    const prefix = error instanceof ConfigError ? "configuration error" : "fatal";
    console.error(`[thinkstream] ${prefix}: ${summarizeError(error)}`);
    process.exitCode = 1;
  },
);
