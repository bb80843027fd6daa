/**
 * Structured logging utility
 *
 * Components take a Logger at construction; each run creates its own scoped
 * logger with createLogger() instead of sharing module state.
 */

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, error?: unknown) => void;
}

function formatMeta(meta?: LogMeta): string {
  return meta ? JSON.stringify(meta) : "";
}

export function createLogger(scope?: string): Logger {
  const prefix = scope ? ` [${scope}]` : "";

  return {
    debug: (msg, meta) => {
      if (process.env.DEBUG) {
        console.log(`[DEBUG]${prefix} ${msg}`, formatMeta(meta));
      }
    },

    info: (msg, meta) => {
      console.log(`[INFO]${prefix} ${msg}`, formatMeta(meta));
    },

    warn: (msg, meta) => {
      console.warn(`[WARN]${prefix} ${msg}`, formatMeta(meta));
    },

    error: (msg, error) => {
      console.error(`[ERROR]${prefix} ${msg}`, error ?? "");
    },
  };
}

export const logger = createLogger();

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
