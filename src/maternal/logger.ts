import pino, { type Logger, type LoggerOptions } from "pino";

// Profile fields that identify a person; censored wherever they appear in a log line.
const REDACTED_FIELDS = ["name", "emergency_contact"];

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  stderr?: boolean;
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? "info", stderr = false } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: {
      paths: [...REDACTED_FIELDS, ...REDACTED_FIELDS.map((field) => `*.${field}`)],
      censor: "[REDACTED]",
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return stderr ? pino(loggerOptions, pino.destination(2)) : pino(loggerOptions);
}

export type { Logger };
