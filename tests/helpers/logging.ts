import { createLogger, type Logger } from "../../src/shared/logger";

export interface CapturedLogger {
  logger: Logger;
  lines: Record<string, unknown>[];
  messages: () => string[];
}

/** A debug-level logger that keeps parsed entries in memory. */
export function captureLogger(): CapturedLogger {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger("debug", {}, (line) => {
    lines.push(JSON.parse(line) as Record<string, unknown>);
  });
  return { logger, lines, messages: () => lines.map((l) => String(l.message)) };
}
