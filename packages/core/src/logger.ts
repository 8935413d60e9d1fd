/**
 * Structured Logging
 * Leveled, contextual entries on stderr; stdout stays free for command output.
 * Messages, context values and errors are redacted before any handler sees them.
 */

import { REDACTED, redactSecrets } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * runId, subjectId, stepId, phase, component and anything else worth filtering on
 */
export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const RESET = "\x1b[0m";

function formatEntry(entry: LogEntry): string[] {
  const head = `${COLORS[entry.level]}[${entry.timestamp}] [${entry.level.toUpperCase()}]${RESET} ${entry.message}`;
  const lines = [entry.context ? `${head} ${JSON.stringify(entry.context)}` : head];

  if (entry.error) {
    lines.push(`  Error: ${entry.error.message}`);
    if (entry.error.stack) {
      lines.push(`  Stack: ${entry.error.stack.split("\n").slice(1, 4).join("\n")}`);
    }
  }
  return lines;
}

const consoleHandler: LogHandler = (entry) => {
  for (const line of formatEntry(entry)) {
    console.error(line);
  }
};

const SECRET_KEYS = /^(api[_-]?key|authorization|token|secret|password|key)$/i;

function redactValue(value: unknown): unknown {
  if (typeof value === "string") {
    return redactSecrets(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value !== null && typeof value === "object") {
    return redactContext(value);
  }
  return value;
}

function redactContext(context: object): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = SECRET_KEYS.test(key) ? REDACTED : redactValue(value);
  }
  return out;
}

// Shared by the root logger and every child
const state: { level: LogLevel; handlers: LogHandler[] } = {
  level: "info",
  handlers: [consoleHandler],
};

export class Logger {
  constructor(private readonly baseContext: LogContext = {}) {}

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.write("error", message, context, error instanceof Error ? error : undefined);
  }

  metric(name: string, value: number, context?: LogContext): void {
    this.write("info", `METRIC: ${name}=${value}`, { ...context, metric: name, value });
  }

  child(context: LogContext): Logger {
    return new Logger({ ...this.baseContext, ...context });
  }

  private write(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[state.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactSecrets(message),
    };

    const merged = { ...this.baseContext, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactContext(merged);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactSecrets(error.message),
        stack: error.stack ? redactSecrets(error.stack) : undefined,
      };
    }

    for (const handler of state.handlers) {
      try {
        handler(entry);
      } catch (handlerError) {
        console.error("Logger handler error:", handlerError);
      }
    }
  }
}

class RootLogger extends Logger {
  setLevel(level: LogLevel): void {
    state.level = level;
  }

  getLevel(): LogLevel {
    return state.level;
  }

  addHandler(handler: LogHandler): void {
    state.handlers.push(handler);
  }

  /**
   * Replace every handler, the console one included (tests capture entries this way)
   */
  setHandlers(handlers: LogHandler[]): void {
    state.handlers = [...handlers];
  }

  resetHandlers(): void {
    state.handlers = [consoleHandler];
  }
}

export const logger = new RootLogger();
