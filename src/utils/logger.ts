/**
 * mysql-advisor - Centralized Logger
 *
 * Leveled diagnostics on stderr with credential redaction. stdout is
 * reserved for the report itself.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown> | undefined;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Patterns use bounded, non-overlapping character classes to stay clear
 * of catastrophic backtracking.
 */
const SENSITIVE_PATTERNS = [
  /\bpassword[=:]\s*[^\s,;]{1,100}/gi,
  /\bpasswd[=:]\s*[^\s,;]{1,100}/gi,
  /\bsecret[=:]\s*[^\s,;]{1,100}/gi,
  /\btoken[=:]\s*[^\s,;]{1,100}/gi,
  /mysql:\/\/[^:/@\s]{1,50}:[^@\s]{1,100}@/gi,
];

const SENSITIVE_KEYS = ["password", "passwd", "pwd", "secret", "token"];

/** Longer input is truncated before any pattern runs */
const MAX_REDACT_LENGTH = 10000;

function redactSensitive(input: string): string {
  if (input.length > MAX_REDACT_LENGTH) {
    return (
      redactSensitive(input.substring(0, MAX_REDACT_LENGTH)) + "...[TRUNCATED]"
    );
  }

  let result = input;
  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, (match) => {
      if (match.toLowerCase().startsWith("mysql://")) {
        const user = match.slice("mysql://".length, match.indexOf(":", 8));
        return `mysql://${user}:[REDACTED]@`;
      }
      const delimiterIndex = match.search(/[=:]/);
      return delimiterIndex >= 0
        ? match.substring(0, delimiterIndex + 1) + "[REDACTED]"
        : "[REDACTED]";
    });
  }
  return result;
}

function sanitizeValue(key: string, value: unknown): unknown {
  const lowerKey = key.toLowerCase();
  if (SENSITIVE_KEYS.some((k) => lowerKey.includes(k))) {
    return "[REDACTED]";
  }
  if (typeof value === "string") {
    return redactSensitive(value);
  }
  if (value instanceof Error) {
    return { name: value.name, message: redactSensitive(value.message) };
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(key, item));
  }
  if (typeof value === "object" && value !== null) {
    return sanitizeContext(value);
  }
  return value;
}

function sanitizeContext(context: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = sanitizeValue(key, value);
  }
  return result;
}

/**
 * Strip control characters (keeping tab, newline, carriage return) so log
 * lines cannot be forged through server-supplied text
 */
function sanitizeMessage(message: string): string {
  let result = "";
  for (const char of message) {
    const code = char.charCodeAt(0);
    if (
      (code >= 32 && code !== 127) ||
      code === 10 ||
      code === 9 ||
      code === 13
    ) {
      result += char;
    }
  }
  return result;
}

function formatEntry(entry: LogEntry): string {
  const level = entry.level.toUpperCase().padEnd(5);
  let output = `[mysql-advisor] ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    output += ` ${JSON.stringify(entry.context)}`;
  }

  return output;
}

let currentLogLevel: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/**
 * Narrow an arbitrary string to a log level
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized !== undefined && isLogLevel(normalized)
    ? normalized
    : undefined;
}

function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLogLevel]) return;

  const entry: LogEntry = {
    level,
    message: sanitizeMessage(redactSensitive(message)),
    context: context ? sanitizeContext(context) : undefined,
  };

  console.error(formatEntry(entry));
}

export const logger = {
  debug: (message: string, context?: Record<string, unknown>) =>
    log("debug", message, context),
  info: (message: string, context?: Record<string, unknown>) =>
    log("info", message, context),
  warn: (message: string, context?: Record<string, unknown>) =>
    log("warn", message, context),
  error: (message: string, context?: Record<string, unknown>) =>
    log("error", message, context),

  setLevel: (level: LogLevel) => {
    currentLogLevel = level;
  },

  getLevel: (): LogLevel => currentLogLevel,
};

const envLevel = parseLogLevel(process.env["LOG_LEVEL"]);
if (envLevel) {
  currentLogLevel = envLevel;
}
