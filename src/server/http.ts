import http from "node:http";
import type { DebugListener } from "../chat-types.js";
import type { AppConfig } from "../config.js";
import { summarizeError } from "../errors.js";
import { logWarning } from "../log.js";
import { encodeFrame, encodeKeepAlive } from "../protocol/index.js";
import type { UpstreamModel } from "../upstream/index.js";
import { createComplianceLog, type AuditSink } from "./compliance-log.js";
import { createSessionId, runChainOfThoughtStream } from "./emitter.js";
import {
  CORS_HEADERS,
  HttpError,
  SSE_HEADERS,
  parseChatRequestBody,
  readRequestBody,
  writeError,
  writeJson,
} from "./protocol.js";

const SERVICE_NAME = "thinkstream chain-of-thought API";
const SERVICE_VERSION = "0.1.0";
const DEFAULT_KEEP_ALIVE_MS = 15_000;

export type ChatServerDependencies = {
  config: AppConfig;
  upstream: UpstreamModel;
  createAuditSink?: (sessionId: string) => AuditSink;
  createSessionId?: () => string;
  keepAliveMs?: number;
  onDebug?: DebugListener;
};

export type RunningChatServer = {
  server: http.Server;
  host: string;
  port: number;
  url: string;
  close: () => Promise<void>;
};

type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>;

export function createChatRequestHandler(deps: ChatServerDependencies): RequestHandler {
  const createAuditSink =
    deps.createAuditSink ??
    ((sessionId: string) =>
      createComplianceLog(
        {
          enabled: deps.config.complianceLoggingEnabled,
          directory: deps.config.complianceLogDir,
        },
        sessionId,
      ));
  const nextSessionId = deps.createSessionId ?? (() => createSessionId());
  const keepAliveMs = deps.keepAliveMs ?? DEFAULT_KEEP_ALIVE_MS;

  const handleStream = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const body = parseChatRequestBody(await readRequestBody(req));
    const sessionId = nextSessionId();
    const audit = createAuditSink(sessionId);
    const abortController = new AbortController();

    res.writeHead(200, { ...SSE_HEADERS, ...CORS_HEADERS });
    res.flushHeaders();
    res.on("close", () => {
      if (!res.writableEnded) {
        abortController.abort();
      }
    });

    const heartbeat = keepAliveMs > 0
      ? setInterval(() => {
          res.write(encodeKeepAlive());
        }, keepAliveMs)
      : null;
    heartbeat?.unref();

    try {
      const outcome = await runChainOfThoughtStream(
        {
          query: body.query,
          systemPrompt: body.systemPrompt ?? deps.config.systemPrompt,
        },
        {
          sessionId,
          upstream: deps.upstream,
          audit,
          signal: abortController.signal,
          onDebug: deps.onDebug,
          send: (event) => {
            if (!res.writableEnded && !res.destroyed) {
              res.write(encodeFrame(event));
            }
          },
        },
      );
      if (outcome.status === "aborted") {
        deps.onDebug?.({ stage: "client_disconnected", data: { sessionId } });
      }
    } finally {
      if (heartbeat) {
        clearInterval(heartbeat);
      }
      res.end();
      await audit.flush();
    }
  };

  const handleChat = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    const body = parseChatRequestBody(await readRequestBody(req));
    const sessionId = nextSessionId();
    const audit = createAuditSink(sessionId);

    const outcome = await runChainOfThoughtStream(
      {
        query: body.query,
        systemPrompt: body.systemPrompt ?? deps.config.systemPrompt,
      },
      {
        sessionId,
        upstream: deps.upstream,
        audit,
        onDebug: deps.onDebug,
        send: () => undefined,
      },
    );

    await audit.flush();
    if (outcome.status !== "complete") {
      throw new HttpError(500, `Processing error: ${outcome.errorMessage ?? "stream did not complete"}`);
    }

    writeJson(res, 200, {
      session_id: outcome.sessionId,
      reasoning: outcome.reasoning,
      answer: outcome.answer,
      compliance_log: audit.logPath,
      timestamp: new Date().toISOString(),
    });
  };

  const handleHealth = (res: http.ServerResponse) => {
    const description = deps.upstream.description;
    writeJson(res, 200, {
      status: "healthy",
      timestamp: new Date().toISOString(),
      config: {
        provider: description.provider,
        model: description.model,
        api_version: description.apiVersion,
        compliance_logging: deps.config.complianceLoggingEnabled,
      },
    });
  };

  const handleRoot = (res: http.ServerResponse) => {
    writeJson(res, 200, {
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: "healthy",
      endpoints: {
        chat: "/chat",
        chat_stream: "/chat/stream",
        health: "/health",
      },
    });
  };

  return async (req, res) => {
    const method = (req.method ?? "GET").toUpperCase();
    const { pathname } = new URL(req.url ?? "/", "http://localhost");

    try {
      if (method === "OPTIONS") {
        res.writeHead(204, CORS_HEADERS);
        res.end();
        return;
      }
      if (method === "GET" && pathname === "/") {
        handleRoot(res);
        return;
      }
      if (method === "GET" && pathname === "/health") {
        handleHealth(res);
        return;
      }
      if (method === "POST" && pathname === "/chat/stream") {
        await handleStream(req, res);
        return;
      }
      if (method === "POST" && pathname === "/chat") {
        await handleChat(req, res);
        return;
      }
      throw new HttpError(404, "Not found");
    } catch (error) {
      if (res.headersSent) {
        logWarning(`request ${method} ${pathname} failed after headers were sent: ${summarizeError(error)}`);
        res.end();
        return;
      }
      if (error instanceof HttpError) {
        writeError(res, error);
        return;
      }
      logWarning(`request ${method} ${pathname} failed: ${summarizeError(error)}`);
      writeError(res, new HttpError(500, "Internal server error"));
    }
  };
}

export function createChatServer(deps: ChatServerDependencies): http.Server {
  const handler = createChatRequestHandler(deps);
  return http.createServer((req, res) => {
    void handler(req, res);
  });
}

export async function startChatServer(
  deps: ChatServerDependencies,
  options: { host?: string; port?: number } = {},
): Promise<RunningChatServer> {
  const host = options.host ?? deps.config.host;
  const server = createChatServer(deps);
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port ?? deps.config.port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await closeServer(server);
    throw new Error("Failed to determine chat server port.");
  }

  const displayHost = host === "0.0.0.0" || host === "::" ? "localhost" : host;
  return {
    server,
    host,
    port: address.port,
    url: `http://${displayHost}:${address.port}`,
    close: () => closeServer(server),
  };
}

async function closeServer(server: http.Server): Promise<void> {
  if (!server.listening) {
    return;
  }
  server.closeAllConnections();
  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
}
