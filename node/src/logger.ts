import pino from "pino"

export type LogMeta = Record<string, unknown>

export interface Logger {
  debug(msg: string, meta?: LogMeta): void
  info(msg: string, meta?: LogMeta): void
  warn(msg: string, meta?: LogMeta): void
  error(msg: string, meta?: LogMeta): void
}

/**
 * Map a LOG_LEVEL value to a pino level; unknown values fall back to "info".
 */
export function resolveLogLevel(raw: string | undefined): string {
  const level = raw?.trim().toLowerCase()
  if (!level) return "info"
  return level === "silent" || Object.hasOwn(pino.levels.values, level) ? level : "info"
}

// stderr keeps stdout free for command output
const root = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
}, pino.destination(2))

export function createLogger(component: string): Logger {
  const child = root.child({ component })
  return {
    debug: (msg, meta) => child.debug(meta ?? {}, msg),
    info: (msg, meta) => child.info(meta ?? {}, msg),
    warn: (msg, meta) => child.warn(meta ?? {}, msg),
    error: (msg, meta) => child.error(meta ?? {}, msg),
  }
}
