import type { DebugEvent, DebugListener } from "./chat-types.js";

const LOG_PREFIX = "[thinkstream]";

export function logInfo(message: string): void {
  console.info(`${LOG_PREFIX} ${message}`);
}

export function logWarning(message: string): void {
  console.warn(`${LOG_PREFIX} ${message}`);
}

export function createConsoleDebugListener(enabled: boolean): DebugListener | undefined {
  if (!enabled) {
    return undefined;
  }
  return (event: DebugEvent) => {
    console.debug(`${LOG_PREFIX} ${event.stage}`, event.data);
  };
}
