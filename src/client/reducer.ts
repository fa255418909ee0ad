import type { ChatMessage, ChatState } from "../chat-types.js";
import { assertNever, type StreamEvent } from "../protocol/index.js";

export const INITIAL_CHAT_STATE: ChatState = {
  messages: [],
  isLoading: false,
  error: null,
};

export function composeFinalContent(reasoning: string, answer: string): string {
  if (!reasoning) {
    return answer;
  }
  return answer ? `${reasoning}\n\n${answer}` : reasoning;
}

export function appendUserMessage(
  state: ChatState,
  message: { id: string; content: string; timestamp: Date },
): ChatState {
  const userMessage: ChatMessage = {
    id: message.id,
    role: "user",
    content: message.content,
    timestamp: message.timestamp,
    isStreaming: false,
    reasoning: "",
    answer: "",
  };
  return { ...state, messages: [...state.messages, userMessage] };
}

export function beginAssistantMessage(state: ChatState, message: { id: string; timestamp: Date }): ChatState {
  const assistantMessage: ChatMessage = {
    id: message.id,
    role: "assistant",
    content: "",
    timestamp: message.timestamp,
    isStreaming: true,
    reasoning: "",
    answer: "",
  };
  return {
    messages: [...state.messages, assistantMessage],
    isLoading: true,
    error: null,
  };
}

/**
 * Applies one decoded event to the streaming assistant message. Events are
 * applied in arrival order without reordering; a message that has finished
 * streaming, or has been removed, ignores anything that still arrives for it.
 */
export function applyStreamEvent(state: ChatState, messageId: string, event: StreamEvent): ChatState {
  const index = state.messages.findIndex((message) => message.id === messageId);
  const target = state.messages[index];
  if (!target || !target.isStreaming) {
    return state;
  }

  switch (event.type) {
    case "reasoning":
      return replaceMessage(state, index, {
        ...target,
        reasoning: target.reasoning + event.content,
      });
    case "reasoning_done":
      // Phase boundary: nothing to accumulate, but subscribers still repaint.
      return { ...state, messages: [...state.messages] };
    case "answer":
      return replaceMessage(state, index, {
        ...target,
        answer: target.answer + event.content,
      });
    case "complete":
      return {
        ...replaceMessage(state, index, {
          ...target,
          isStreaming: false,
          content: composeFinalContent(target.reasoning, target.answer),
        }),
        isLoading: false,
      };
    case "error":
      return failTurn(state, messageId, event.message);
    default:
      return assertNever(event);
  }
}

/**
 * Drops the in-flight assistant message and raises a session-level error.
 * Used for explicit `error` frames and for streams that end without a
 * terminal frame.
 */
export function failTurn(state: ChatState, messageId: string, message: string): ChatState {
  const target = state.messages.find((entry) => entry.id === messageId);
  if (!target || !target.isStreaming) {
    return state;
  }
  return {
    messages: state.messages.filter((entry) => entry.id !== messageId),
    isLoading: false,
    error: message,
  };
}

export function clearMessages(): ChatState {
  return { ...INITIAL_CHAT_STATE, messages: [] };
}

function replaceMessage(state: ChatState, index: number, message: ChatMessage): ChatState {
  const messages = [...state.messages];
  messages[index] = message;
  return { ...state, messages };
}
