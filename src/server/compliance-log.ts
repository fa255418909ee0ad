import fs from "node:fs/promises";
import path from "node:path";
import type { StreamEventType } from "../protocol/index.js";
import { summarizeError } from "../errors.js";
import { logWarning } from "../log.js";

export type SessionStartRecord = {
  event_type: "session_start";
  session_id: string;
  start_time: string;
  model: string;
  api_version: string | null;
  endpoint: string | null;
  user_query: string;
};

export type StreamEventRecord = {
  event_type: StreamEventType;
  timestamp: string;
  session_id: string;
  content: string;
  sequence_number: number;
};

export type SessionCompleteRecord = {
  event_type: "session_complete";
  timestamp: string;
  session_id: string;
  reasoning_word_count: number;
  answer_word_count: number;
  total_reasoning_text: string;
  total_answer_text: string;
};

export type ComplianceRecord = SessionStartRecord | StreamEventRecord | SessionCompleteRecord;

/**
 * Append-only audit trail for one session. `append` never throws and never
 * waits on storage; `flush` resolves once everything queued so far has been
 * written or has failed.
 */
export interface AuditSink {
  readonly logPath: string | null;
  append(record: ComplianceRecord): void;
  flush(): Promise<void>;
}

export const DEFAULT_AUDIT_QUEUE_CAPACITY = 1_000;

export type FileComplianceLogOptions = {
  directory: string;
  sessionId: string;
  capacity?: number;
  onWarning?: (message: string) => void;
};

export class FileComplianceLog implements AuditSink {
  readonly logPath: string;
  private readonly directory: string;
  private readonly sessionId: string;
  private readonly capacity: number;
  private readonly onWarning: (message: string) => void;
  private queue: string[] = [];
  private draining: Promise<void> | null = null;
  private directoryReady = false;
  private droppedRecords = 0;
  private failedWrites = 0;

  constructor(options: FileComplianceLogOptions) {
    this.directory = options.directory;
    this.sessionId = options.sessionId;
    this.logPath = path.join(options.directory, `${options.sessionId}.jsonl`);
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_AUDIT_QUEUE_CAPACITY);
    this.onWarning = options.onWarning ?? logWarning;
  }

  get stats(): { queued: number; dropped: number; failedWrites: number } {
    return {
      queued: this.queue.length,
      dropped: this.droppedRecords,
      failedWrites: this.failedWrites,
    };
  }

  append(record: ComplianceRecord): void {
    if (this.queue.length >= this.capacity) {
      this.droppedRecords += 1;
      if (this.droppedRecords === 1) {
        this.onWarning(`compliance log queue full for ${this.sessionId}; dropping records`);
      }
      return;
    }

    this.queue.push(`${JSON.stringify(record)}\n`);
    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  flush(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  private async drain(): Promise<void> {
    try {
      while (this.queue.length > 0) {
        const batch = this.queue.splice(0).join("");
        try {
          await this.ensureDirectory();
          await fs.appendFile(this.logPath, batch, "utf8");
        } catch (error) {
          this.failedWrites += 1;
          this.onWarning(`compliance log write failed for ${this.sessionId}: ${summarizeError(error)}`);
        }
      }
    } finally {
      this.draining = null;
    }
  }

  private async ensureDirectory(): Promise<void> {
    if (this.directoryReady) {
      return;
    }
    await fs.mkdir(this.directory, { recursive: true });
    this.directoryReady = true;
  }
}

export class DisabledComplianceLog implements AuditSink {
  readonly logPath = null;

  append(): void {
    // compliance logging disabled
  }

  flush(): Promise<void> {
    return Promise.resolve();
  }
}

export function createComplianceLog(
  options: { enabled: boolean; directory: string; onWarning?: (message: string) => void },
  sessionId: string,
): AuditSink {
  if (!options.enabled) {
    return new DisabledComplianceLog();
  }
  return new FileComplianceLog({
    directory: options.directory,
    sessionId,
    onWarning: options.onWarning,
  });
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
