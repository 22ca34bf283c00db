import pino from "pino";

const LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
type PinoLevel = (typeof LEVELS)[number];

function resolveLevel(raw: string | undefined): PinoLevel {
  const value = (raw || "info").toLowerCase();
  return LEVELS.find((level) => level === value) ?? "info";
}

const pinoLogger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Fold trailing log arguments into a pino merge object.
 * Errors go under `err` so pino's serializer keeps the stack.
 */
function toMergeObject(context: unknown[]): Record<string, unknown> | undefined {
  if (context.length === 0) return undefined;
  const [first] = context;
  if (context.length === 1) {
    if (first instanceof Error) return { err: first };
    return { context: first };
  }
  return { context };
}

function write(level: "debug" | "info" | "warn" | "error", msg: string, context: unknown[]): void {
  const merge = toMergeObject(context);
  if (merge) {
    pinoLogger[level](merge, msg);
  } else {
    pinoLogger[level](msg);
  }
}

export const logger = {
  debug(msg: string, ...context: unknown[]): void {
    write("debug", msg, context);
  },

  info(msg: string, ...context: unknown[]): void {
    write("info", msg, context);
  },

  /** INFO line marking a lifecycle milestone. */
  success(msg: string, ...context: unknown[]): void {
    const merge = toMergeObject(context);
    pinoLogger.info({ success: true, ...merge }, msg);
  },

  warning(msg: string, ...context: unknown[]): void {
    write("warn", msg, context);
  },

  error(msg: string, ...context: unknown[]): void {
    write("error", msg, context);
  },
};

export type Logger = typeof logger;
