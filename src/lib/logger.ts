/**
 * Logger with sensitive data redaction
 *
 * The talker logs request URLs and client options, both of which can carry the
 * MangaBaka API key, so every message and context object is scrubbed first.
 */

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

interface LogContext {
  source?: string;
  [key: string]: unknown;
}

/**
 * Sensitive field patterns to redact
 */
const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /api[_-]?key[=:]\s*['"]?([^'"&\s]+)/gi, replacement: 'api_key=[REDACTED]' },
  { pattern: /bearer\s+([a-zA-Z0-9_.-]+)/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /token[=:]\s*['"]?([^'"&\s]+)/gi, replacement: 'token=[REDACTED]' },
  { pattern: /secret[=:]\s*['"]?([^'"&\s]+)/gi, replacement: 'secret=[REDACTED]' },
  { pattern: /password[=:]\s*['"]?([^'"&\s]+)/gi, replacement: 'password=[REDACTED]' },

  // URLs with credentials
  { pattern: /https?:\/\/([^:/\s]+):([^@\s]+)@/gi, replacement: 'https://[USER]:[REDACTED]@' },
];

/**
 * Sensitive object keys to redact (compared lower-cased)
 */
const SENSITIVE_KEYS = new Set([
  'password', 'token', 'secret', 'apikey', 'api_key', 'key',
  'authorization', 'auth', 'cookie',
  'access_token', 'accesstoken', 'refresh_token', 'refreshtoken',
  'client_secret', 'clientsecret', 'mangabaka_key', 'mangabaka_api_key',
]);

const MAX_DEPTH = 5;
const MAX_ARRAY_ITEMS = 100;
const MAX_OBJECT_KEYS = 50;

function redactString(input: string): string {
  if (!input) return input;
  let result = input;
  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    // global regexes keep lastIndex between calls
    pattern.lastIndex = 0;
    result = result.replace(pattern, replacement);
  }
  return result;
}

function redactObject(obj: unknown, depth: number = MAX_DEPTH, seen: WeakSet<object> = new WeakSet()): unknown {
  if (depth <= 0) return '[MAX_DEPTH_EXCEEDED]';
  if (obj === null || obj === undefined) return obj;
  if (typeof obj === 'string') return redactString(obj);
  if (typeof obj !== 'object') return obj;

  if (seen.has(obj)) return '[CIRCULAR_REFERENCE]';
  seen.add(obj);

  // message/stack are non-enumerable
  if (obj instanceof Error) {
    return redactObject(
      { ...obj, name: obj.name, message: obj.message, stack: obj.stack },
      depth - 1,
      seen
    );
  }

  if (Array.isArray(obj)) {
    return obj.slice(0, MAX_ARRAY_ITEMS).map((item) => redactObject(item, depth - 1, seen));
  }

  const result: Record<string, unknown> = {};
  const entries = Object.entries(obj);

  for (const [key, value] of entries.slice(0, MAX_OBJECT_KEYS)) {
    result[key] = SENSITIVE_KEYS.has(key.toLowerCase())
      ? '[REDACTED]'
      : redactObject(value, depth - 1, seen);
  }

  if (entries.length > MAX_OBJECT_KEYS) {
    result['...truncated'] = `${entries.length - MAX_OBJECT_KEYS} more keys`;
  }

  return result;
}

function toContext(context: unknown): LogContext | undefined {
  if (context === undefined) return undefined;
  if (typeof context === 'object' && context !== null && !Array.isArray(context)) {
    const redacted = redactObject(context);
    return typeof redacted === 'object' && redacted !== null && !Array.isArray(redacted)
      ? { ...redacted }
      : { value: redacted };
  }
  return { value: redactObject(context) };
}

class Logger {
  private get isProduction(): boolean {
    return process.env.NODE_ENV === 'production';
  }

  private formatMessage(level: LogLevel, message: string, context?: unknown): string {
    const timestamp = new Date().toISOString();
    const redactedMessage = redactString(message);
    const redactedContext = toContext(context);

    if (this.isProduction) {
      return JSON.stringify({
        timestamp,
        level: level.toUpperCase(),
        message: redactedMessage,
        ...redactedContext,
      });
    }

    const contextStr = redactedContext ? ` ${JSON.stringify(redactedContext)}` : '';
    return `[${timestamp}] ${level.toUpperCase()}: ${redactedMessage}${contextStr}`;
  }

  info(message: string, context?: unknown): void {
    console.info(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: unknown): void {
    console.warn(this.formatMessage('warn', message, context));
  }

  error(message: string, context?: unknown): void {
    console.error(this.formatMessage('error', message, context));
  }

  debug(message: string, context?: unknown): void {
    if (!this.isProduction) {
      console.debug(this.formatMessage('debug', message, context));
    }
  }
}

export const logger = new Logger();
