/**
 * Structured logging for SDK operations
 *
 * Every level writes to stderr: stdout belongs to command output.
 */

export type LogLevel = "debug" | "warn";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  pipelineId?: string;
  message?: string;
  details?: Record<string, unknown>;
}

class Logger {
  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (level === "debug" && !process.env.PIPECLOUD_DEBUG) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.pipelineId) {
      parts.push(`pipeline=${entry.pipelineId}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    const line = parts.join(" ");
    if (level === "warn") {
      console.warn(line);
    } else {
      console.error(line);
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
