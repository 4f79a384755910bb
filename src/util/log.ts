/**
 * Structured logging.
 *
 * Every module takes a tagged logger with `Log.create({ service })`.
 * Lines are JSON written to stderr by pino, so stdout stays free for
 * command output.
 */

import pino from "pino"

export namespace Log {
  export type Level = "debug" | "info" | "warn" | "error" | "silent"
  export type Extra = Record<string, unknown>

  export interface Logger {
    debug(message: string, extra?: Extra): void
    info(message: string, extra?: Extra): void
    warn(message: string, extra?: Extra): void
    error(message: string, extra?: Extra): void
  }

  const Levels: readonly Level[] = ["debug", "info", "warn", "error", "silent"]

  let root: pino.Logger | null = null

  function parseLevel(value: string | undefined): Level {
    const match = Levels.find((level) => level === value?.toLowerCase())
    return match ?? "info"
  }

  function base(): pino.Logger {
    if (root) return root
    root = pino(
      {
        level: parseLevel(process.env.LOG_LEVEL),
        base: undefined,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true }),
    )
    return root
  }

  /**
   * Override the level picked up from LOG_LEVEL.
   */
  export function init(options: { level?: Level }): void {
    if (options.level) {
      base().level = options.level
    }
  }

  export function create(tags: Extra): Logger {
    // Children are resolved per call so a later init() still applies.
    const child = () => base().child(tags)
    return {
      debug: (message, extra) => child().debug(extra ?? {}, message),
      info: (message, extra) => child().info(extra ?? {}, message),
      warn: (message, extra) => child().warn(extra ?? {}, message),
      error: (message, extra) => child().error(extra ?? {}, message),
    }
  }
}
