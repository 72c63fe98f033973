type LogLevel = "info" | "warn" | "error" | "debug";

export interface Logger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
}

// Patterns for credentials that can end up in request URLs or error bodies
const SENSITIVE_PATTERNS: RegExp[] = [
  // GitHub classic and fine-grained tokens
  /gh[pousr]_[A-Za-z0-9]{20,}/g,
  /github_pat_[A-Za-z0-9_]{20,}/g,
  // GitLab personal access tokens
  /glpat-[\w-]{20,}/g,
  // Bearer tokens
  /bearer\s+[\w.-]+/gi,
  // Basic auth
  /basic\s+[\w+/=]+/gi,
  // Token query parameters
  /([?&](?:private_)?token=)[^&\s]+/gi,
];

const MASK = "[REDACTED]";

function sanitizeString(str: string): string {
  let result = str;
  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, (match: string, prefix?: unknown) =>
      typeof prefix === "string" && match.startsWith(prefix)
        ? `${prefix}${MASK}`
        : MASK,
    );
  }
  return result;
}

function sanitizeObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === "string") {
    return sanitizeString(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(sanitizeObject);
  }

  if (typeof obj === "object") {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (
        lowerKey.includes("token") ||
        lowerKey.includes("secret") ||
        lowerKey.includes("password") ||
        lowerKey.includes("authorization")
      ) {
        sanitized[key] = MASK;
      } else {
        sanitized[key] = sanitizeObject(value);
      }
    }
    return sanitized;
  }

  return obj;
}

function sanitizeError(error: Error): { name: string; message: string; stack?: string } {
  return {
    name: error.name,
    message: sanitizeString(error.message),
    stack: error.stack ? sanitizeString(error.stack) : undefined,
  };
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify(sanitizeError(data), null, 2);
  }
  return JSON.stringify(sanitizeObject(data), null, 2);
}

function log(level: LogLevel, scope: string | null, message: string, data?: unknown): void {
  const timestamp = new Date().toISOString();
  const prefix = scope
    ? `[${timestamp}] [${level.toUpperCase()}] [${scope}]`
    : `[${timestamp}] [${level.toUpperCase()}]`;
  const line = `${prefix} ${sanitizeString(message)}`;
  const write = level === "error" || level === "warn" ? console.error : console.log;

  if (data !== undefined) {
    write(line, formatData(data));
  } else {
    write(line);
  }
}

/**
 * Create a logger whose lines carry a component scope, e.g. `[gitlab]`.
 */
export function createLogger(scope: string | null = null): Logger {
  return {
    info: (message, data) => log("info", scope, message, data),
    warn: (message, data) => log("warn", scope, message, data),
    error: (message, data) => log("error", scope, message, data),
    debug: (message, data) => {
      if (process.env.DEBUG) {
        log("debug", scope, message, data);
      }
    },
  };
}

export const logger: Logger = createLogger();

/** @internal */
export const _sanitizeString = sanitizeString;
