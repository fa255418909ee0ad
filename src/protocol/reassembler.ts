import { SSE_DATA_PREFIX } from "./frame.js";

/**
 * Turns transport chunks with arbitrary boundaries into complete `data:`
 * lines. Owns the carry-over text and a streaming UTF-8 decoder, so a
 * multi-byte character split across two chunks decodes once both halves
 * have arrived. One instance per open stream.
 */
export class SseLineReassembler {
  private readonly decoder = new TextDecoder("utf-8");
  private buffer = "";

  get pending(): string {
    return this.buffer;
  }

  push(chunk: Uint8Array | string): string[] {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    if (!text) {
      return [];
    }

    this.buffer += text;
    const lines = this.buffer.split("\n");
    this.buffer = lines.pop() ?? "";
    return lines.map(stripCarriageReturn).filter(isDataLine);
  }

  /**
   * Ends the stream. The unterminated tail is never yielded as a line; it is
   * returned so the caller can tell a truncated stream from a clean end.
   */
  finish(): string {
    const tail = this.buffer + this.decoder.decode();
    this.buffer = "";
    return tail;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

function isDataLine(line: string): boolean {
  return line.startsWith(SSE_DATA_PREFIX);
}
