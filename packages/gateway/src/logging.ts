import { createHash } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** The slice of a pino logger this package writes to. Every level is optional. */
export type SafeLogger = Partial<Record<LogLevel, (first: unknown, message?: string) => void>>;

/** Context keys whose string values are credentials: app and session tokens, login answers, challenges. */
const SECRET_KEY = /token|password|challenge/i;

/** Short sha256 prefix; lets two log lines be matched to one secret without revealing it. */
export const fingerprint = (secret: string) => `***${createHash('sha256').update(secret).digest('hex').slice(0, 8)}`;

const scrub = (context: Record<string, unknown>) =>
  Object.fromEntries(
    Object.entries(context).map(([key, value]) => [key, SECRET_KEY.test(key) && typeof value === 'string' ? fingerprint(value) : value])
  );

/** Writes through an optional logger, replacing secret-bearing context values with fingerprints. */
export const logWithContext = (
  logger: SafeLogger | undefined,
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
) => {
  const write = logger?.[level];
  if (!write) {
    return;
  }
  if (context) {
    write.call(logger, scrub(context), message);
  } else {
    write.call(logger, message);
  }
};

/** Error summary for log context: name, message, and the gateway's `code` / `apiCode` when set. */
export const sanitizeError = (error: unknown): Record<string, string> => {
  if (!(error instanceof Error)) {
    return { message: typeof error === 'string' ? error : 'unknown' };
  }
  const summary: Record<string, string> = { name: error.name, message: error.message };
  if ('code' in error && typeof error.code === 'string') {
    summary.code = error.code;
  }
  if ('apiCode' in error && typeof error.apiCode === 'string') {
    summary.apiCode = error.apiCode;
  }
  return summary;
};
