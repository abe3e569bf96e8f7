/**
 * Logger
 * ======
 * Minimal levelled logging for assembly builds.
 *
 * @example
 * ```ts
 * const logger = createLogger("info");
 * logger.info("Assembly built", { types: 74 });
 * ```
 */

export type LogLevel = "silent" | "errors" | "warnings" | "info" | "debug";

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/** JSON rendering with repeated objects replaced by `"[Circular]"`. */
function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(value, (_key: string, inner: unknown): unknown => {
    if (typeof inner === "object" && inner !== null) {
      if (seen.has(inner)) return "[Circular]";
      seen.add(inner);
    }
    return inner;
  });
}

/** Append a JSON rendering of `context` to `message`, if there is any. */
function formatMessage(
  message: string,
  context?: Record<string, unknown>,
): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Console-backed logger. Methods below the configured level are no-ops.
 */
export class ConsoleLogger implements Logger {
  private readonly priority: number;

  constructor(level: LogLevel = "info") {
    this.priority = LEVEL_PRIORITY[level];
  }

  public error(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LEVEL_PRIORITY.errors) return;
    console.error(formatMessage(`[ERROR] ${message}`, context));
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LEVEL_PRIORITY.warnings) return;
    console.warn(formatMessage(`[WARN] ${message}`, context));
  }

  public info(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LEVEL_PRIORITY.info) return;
    console.info(formatMessage(`[INFO] ${message}`, context));
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    if (this.priority < LEVEL_PRIORITY.debug) return;
    console.debug(formatMessage(`[DEBUG] ${message}`, context));
  }
}

/** Create a console logger at the given level. */
export function createLogger(level: LogLevel = "info"): Logger {
  return new ConsoleLogger(level);
}

/** Logger that discards everything; the default for library use. */
export const silentLogger: Logger = new ConsoleLogger("silent");
