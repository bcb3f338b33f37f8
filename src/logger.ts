import winston from "winston";

const SERVICE = "phrase-search";

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const prettyFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "HH:mm:ss" }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, service: _service, ...meta }) => {
    const context = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${timestamp} [${level}] ${message}${context}`;
  }),
);

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  /** Drop all output (tests). */
  silent?: boolean;
  /** Write to this stream instead of the console. */
  stream?: NodeJS.WritableStream;
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? "info",
    defaultMeta: { service: SERVICE },
    format: options.pretty ? prettyFormat : jsonFormat,
    transports: [
      options.stream
        ? new winston.transports.Stream({ stream: options.stream })
        : // diagnostics go to stderr so CLI output on stdout stays clean
          new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"] }),
    ],
    silent: options.silent ?? false,
  });
}

export type Logger = winston.Logger;

/**
 * Log metadata for a caught value. `format.errors` only unwraps an Error
 * passed as the entry itself, and a nested Error serializes to `{}`.
 */
export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}
