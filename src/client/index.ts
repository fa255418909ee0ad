export { CHAT_STREAM_PATH, DEFAULT_API_BASE_URL, openChatStream, type ChatStreamRequest } from "./api.js";
export {
  INITIAL_CHAT_STATE,
  appendUserMessage,
  applyStreamEvent,
  beginAssistantMessage,
  clearMessages,
  composeFinalContent,
  failTurn,
} from "./reducer.js";
export {
  CANCELLED_TURN_MESSAGE,
  ChatSessionStore,
  IMPLICIT_DISCONNECT_MESSAGE,
  type ChatSessionStoreOptions,
  type ChatStateListener,
  type ChatTransport,
  type ChatTurnResult,
  type StreamEventListener,
} from "./session.js";
export { readStreamEvents, type ReadStreamEventsOptions } from "./stream.js";
