import { randomUUID } from "node:crypto";
import type { ChatState, DebugListener } from "../chat-types.js";
import { createAbortError, isAbortError, summarizeError } from "../errors.js";
import { isTerminalEvent, type StreamEvent, type TerminalStreamEvent } from "../protocol/index.js";
import {
  INITIAL_CHAT_STATE,
  appendUserMessage,
  applyStreamEvent,
  beginAssistantMessage,
  clearMessages,
  failTurn,
} from "./reducer.js";
import { readStreamEvents } from "./stream.js";

export const IMPLICIT_DISCONNECT_MESSAGE = "Stream ended before completion";
export const CANCELLED_TURN_MESSAGE = "Request cancelled";

export type ChatTransport = (request: {
  query: string;
  systemPrompt?: string;
  signal: AbortSignal;
}) => Promise<ReadableStream<Uint8Array>>;

export type ChatStateListener = (state: ChatState) => void;
export type StreamEventListener = (event: StreamEvent, messageId: string) => void;

export type ChatTurnResult =
  | { status: "completed"; sessionId: string; messageId: string }
  | { status: "failed"; message: string }
  | { status: "skipped"; reason: "empty_input" | "turn_in_flight" };

export type ChatSessionStoreOptions = {
  transport: ChatTransport;
  systemPrompt?: string;
  onDebug?: DebugListener;
  createId?: () => string;
  now?: () => Date;
};

/**
 * Owns the visible chat history for one client session and runs chat turns
 * through the reassemble → decode → reduce pipeline. Subscribers are called
 * synchronously after every transition, in order, one call per event.
 */
export class ChatSessionStore {
  private state: ChatState = INITIAL_CHAT_STATE;
  private readonly stateListeners = new Set<ChatStateListener>();
  private readonly eventListeners = new Set<StreamEventListener>();
  private readonly transport: ChatTransport;
  private readonly systemPrompt?: string;
  private readonly onDebug?: DebugListener;
  private readonly createId: () => string;
  private readonly now: () => Date;
  private activeAbortController: AbortController | null = null;

  constructor(options: ChatSessionStoreOptions) {
    this.transport = options.transport;
    this.systemPrompt = options.systemPrompt;
    this.onDebug = options.onDebug;
    this.createId = options.createId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  getState(): ChatState {
    return this.state;
  }

  subscribe(listener: ChatStateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  onStreamEvent(listener: StreamEventListener): () => void {
    this.eventListeners.add(listener);
    return () => {
      this.eventListeners.delete(listener);
    };
  }

  async send(input: string): Promise<ChatTurnResult> {
    const query = input.trim();
    if (!query) {
      return { status: "skipped", reason: "empty_input" };
    }
    if (this.activeAbortController) {
      this.onDebug?.({ stage: "turn_rejected", data: { reason: "turn_in_flight" } });
      return { status: "skipped", reason: "turn_in_flight" };
    }

    const abortController = new AbortController();
    this.activeAbortController = abortController;

    const userMessageId = this.createId();
    const messageId = this.createId();
    this.setState(appendUserMessage(this.state, { id: userMessageId, content: query, timestamp: this.now() }));
    this.setState(beginAssistantMessage(this.state, { id: messageId, timestamp: this.now() }));

    let terminal: TerminalStreamEvent | null = null;
    let failure: string | null = null;
    try {
      const body = await this.transport({
        query,
        systemPrompt: this.systemPrompt,
        signal: abortController.signal,
      });

      for await (const event of readStreamEvents(body, { onDebug: this.onDebug })) {
        this.dispatch(messageId, event);
        if (isTerminalEvent(event)) {
          terminal = event;
          break;
        }
      }
    } catch (error) {
      failure = isAbortError(error) || abortController.signal.aborted
        ? CANCELLED_TURN_MESSAGE
        : summarizeError(error);
      this.onDebug?.({ stage: "turn_transport_error", data: { messageId, error: summarizeError(error) } });
    } finally {
      this.activeAbortController = null;
    }

    if (terminal?.type === "complete") {
      return { status: "completed", sessionId: terminal.session_id, messageId };
    }
    if (terminal?.type === "error") {
      return { status: "failed", message: terminal.message };
    }

    const message = failure ?? IMPLICIT_DISCONNECT_MESSAGE;
    this.onDebug?.({ stage: "turn_implicit_error", data: { messageId, message } });
    this.setState(failTurn(this.state, messageId, message));
    return { status: "failed", message };
  }

  /** Aborts the in-flight turn; it then fails like any other disconnect. */
  stop(): void {
    this.activeAbortController?.abort(createAbortError(CANCELLED_TURN_MESSAGE));
  }

  clear(): void {
    this.stop();
    this.setState(clearMessages());
  }

  private dispatch(messageId: string, event: StreamEvent): void {
    this.setState(applyStreamEvent(this.state, messageId, event));
    for (const listener of this.eventListeners) {
      listener(event, messageId);
    }
  }

  private setState(next: ChatState): void {
    if (next === this.state) {
      return;
    }
    this.state = next;
    for (const listener of this.stateListeners) {
      listener(next);
    }
  }
}
