import { pino, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function loggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: { service: "tollgate" },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err
    },
    redact: {
      paths: ["req.headers.authorization", "req.headers[\"x-admin-token\"]"],
      censor: "[redacted]"
    }
  };
}

export function createLogger(level: string, bindings: Record<string, unknown> = {}): Logger {
  return pino(loggerOptions(level)).child(bindings);
}
