import pino from "pino";

/**
 * Narrow logger shape accepted by the core components.
 * A pino logger (or Fastify's request logger) satisfies it; tests pass a capture logger.
 */
export type AuditLogger = {
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
  debug?: (obj: Record<string, unknown>, msg?: string) => void;
};

export type LoggerOptions = {
  level?: string;
  isDev: boolean;
  pretty?: boolean;
};

export function createLogger(opts: LoggerOptions) {
  return pino({
    level: opts.level ?? (opts.isDev ? "debug" : "info"),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(opts.isDev && opts.pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}
