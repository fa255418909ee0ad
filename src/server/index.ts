export {
  DEFAULT_AUDIT_QUEUE_CAPACITY,
  DisabledComplianceLog,
  FileComplianceLog,
  countWords,
  createComplianceLog,
  type AuditSink,
  type ComplianceRecord,
  type SessionCompleteRecord,
  type SessionStartRecord,
  type StreamEventRecord,
} from "./compliance-log.js";
export {
  UPSTREAM_ENDED_EARLY_MESSAGE,
  createSessionId,
  runChainOfThoughtStream,
  type ChainOfThoughtRequest,
  type EmitterOptions,
  type EmitterOutcome,
} from "./emitter.js";
export {
  createChatRequestHandler,
  createChatServer,
  startChatServer,
  type ChatServerDependencies,
  type RunningChatServer,
} from "./http.js";
export { HttpError, parseChatRequestBody } from "./protocol.js";
