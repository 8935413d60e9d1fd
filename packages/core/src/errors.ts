/**
 * Custom Error Types
 * Structured errors for better handling and debugging
 */

/**
 * Base error class for all Sibyl errors
 */
export class SibylError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "SibylError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends SibylError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

export type ProviderErrorKind = "network" | "auth" | "rate_limit" | "api";

/**
 * External provider errors (research provider, market data, LLM)
 */
export class ProviderError extends SibylError {
  public readonly kind: ProviderErrorKind;
  public readonly provider: string;
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    message: string,
    options: {
      kind: ProviderErrorKind;
      provider: string;
      cause?: Error;
      statusCode?: number;
      endpoint?: string;
      context?: Record<string, unknown>;
    }
  ) {
    const retryable = options.kind === "network" || options.kind === "rate_limit";
    // Auth failures never echo upstream text: it may contain the key
    const safeMessage = options.kind === "auth"
      ? `${options.provider} authentication failed`
      : redactSecrets(message);

    super(safeMessage, "PROVIDER_ERROR", {
      cause: options.cause,
      context: options.context,
      retryable,
    });
    this.name = "ProviderError";
    this.kind = options.kind;
    this.provider = options.provider;
    this.statusCode = options.statusCode;
    this.endpoint = options.endpoint;
  }

  static fromStatus(
    provider: string,
    statusCode: number,
    body: string,
    endpoint?: string
  ): ProviderError {
    const kind: ProviderErrorKind =
      statusCode === 401 || statusCode === 403
        ? "auth"
        : statusCode === 429
          ? "rate_limit"
          : "api";

    return new ProviderError(`${provider} API error ${statusCode}: ${body.slice(0, 300)}`, {
      kind,
      provider,
      statusCode,
      endpoint,
    });
  }
}

/**
 * Validation errors (schemas, inputs)
 */
export class ValidationError extends SibylError {
  public readonly field?: string;
  public readonly expected?: string;
  public readonly received?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      expected?: string;
      received?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
    this.expected = options?.expected;
    this.received = options?.received;
  }
}

/**
 * A long-running external task that can no longer be located
 */
export class TaskLostError extends SibylError {
  public readonly externalTaskId: string;

  constructor(externalTaskId: string, context?: Record<string, unknown>) {
    super("task unrecoverable", "TASK_LOST", {
      context: { ...context, externalTaskId },
      retryable: false,
    });
    this.name = "TaskLostError";
    this.externalTaskId = externalTaskId;
  }
}

/**
 * Broken internal invariant (programming error, never user-facing)
 */
export class InvariantError extends SibylError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVARIANT_VIOLATION", { context, retryable: false });
    this.name = "InvariantError";
  }
}

/**
 * Throw an InvariantError unless the condition holds
 */
export function invariant(
  condition: unknown,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new InvariantError(message, context);
  }
}

/**
 * Type guard to check if error is a Sibyl error
 */
function isSibylError(error: unknown): error is SibylError {
  return error instanceof SibylError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isSibylError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a Sibyl error
 */
function wrapError(error: unknown, defaultMessage = "Unknown error"): SibylError {
  if (isSibylError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SibylError(redactSecrets(error.message || defaultMessage), "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new SibylError(
    typeof error === "string" ? redactSecrets(error) : defaultMessage,
    "UNKNOWN_ERROR"
  );
}

// ============================================================
// Redaction
// ============================================================

export const REDACTED = "[REDACTED]";

const SECRET_PATTERNS: RegExp[] = [
  /(x-api-key|api[_-]?key|authorization|apikey|token|secret|passphrase)(["']?\s*[:=]\s*["']?)([^\s"',;&]+)/gi,
  /\bBearer\s+[A-Za-z0-9._~+/=-]+/g,
  /\bsk-[A-Za-z0-9_-]{8,}/g,
  /\beyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{5,}/g,
];

const SECRET_ENV_VARS = ["EXA_API_KEY", "ANTHROPIC_API_KEY", "SUPABASE_KEY"];

/**
 * Replace anything that looks like a credential with a placeholder
 */
export function redactSecrets(text: string): string {
  let result = text;

  for (const name of SECRET_ENV_VARS) {
    const value = process.env[name];
    if (value && value.length >= 6) {
      result = result.split(value).join(REDACTED);
    }
  }

  for (const pattern of SECRET_PATTERNS) {
    result = result.replace(pattern, (match: string, key?: string, sep?: string) =>
      key !== undefined && sep !== undefined ? `${key}${sep}${REDACTED}` : REDACTED
    );
  }

  return result;
}

export type RedactedErrorKind = ProviderErrorKind | "config" | "validation" | "task_lost" | "internal";

export interface RedactedError {
  kind: RedactedErrorKind;
  message: string;
}

/**
 * Convert any error into a kind + message that is safe to return or print
 */
export function toRedactedError(error: unknown): RedactedError {
  if (error instanceof ProviderError) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof ConfigError) {
    return { kind: "config", message: redactSecrets(error.message) };
  }
  if (error instanceof ValidationError) {
    return { kind: "validation", message: redactSecrets(error.message) };
  }
  if (error instanceof TaskLostError) {
    return { kind: "task_lost", message: error.message };
  }
  return { kind: "internal", message: wrapError(error).message };
}
