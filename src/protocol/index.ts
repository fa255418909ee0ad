export {
  DEFAULT_STREAM_ERROR_MESSAGE,
  STREAM_EVENT_TYPES,
  assertNever,
  isStreamEventType,
  isTerminalEvent,
  parseStreamEvent,
  type AnswerEvent,
  type CompleteEvent,
  type ErrorEvent,
  type ReasoningDoneEvent,
  type ReasoningEvent,
  type StreamEvent,
  type StreamEventParseResult,
  type StreamEventType,
  type TerminalStreamEvent,
} from "./events.js";
export { SSE_DATA_PREFIX, SSE_FRAME_TERMINATOR, encodeFrame, encodeKeepAlive } from "./frame.js";
export { SseLineReassembler } from "./reassembler.js";
export { StreamDecoder, decodeStreamLine, type MalformedFrameHandler } from "./decoder.js";
