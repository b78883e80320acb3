/**
 * Debug file logging.
 *
 * The popup owns the terminal, so nothing is ever logged to stdout/stderr.
 * With debug on, Effect's default logger is replaced by one that appends to
 * a rotating file; with debug off, logs are dropped.
 */
import fs from "node:fs"
import path from "node:path"
import { Effect, Layer, LogLevel, Logger } from "effect"
import { FlashConfig } from "./Config"

/** Rotate once the log grows past this size */
export const MAX_LOG_BYTES = 5 * 1024 * 1024

/** Keep `.1` and `.2` */
export const LOG_BACKUP_COUNT = 2

/**
 * Rotate `file` -> `file.1` -> `file.2` when it is larger than `maxBytes`.
 * Returns true when a rotation happened.
 */
export function rotateLogFile(
  file: string,
  maxBytes = MAX_LOG_BYTES,
  backups = LOG_BACKUP_COUNT
): boolean {
  if (!fs.existsSync(file) || fs.statSync(file).size <= maxBytes) {
    return false
  }

  const oldest = `${file}.${backups}`
  if (fs.existsSync(oldest)) fs.unlinkSync(oldest)

  for (let i = backups - 1; i >= 1; i--) {
    const source = `${file}.${i}`
    if (fs.existsSync(source)) fs.renameSync(source, `${file}.${i + 1}`)
  }

  fs.renameSync(file, `${file}.1`)
  return true
}

function formatPart(part: unknown): string {
  if (typeof part === "string") return part
  if (part instanceof Error) return part.message
  try {
    return JSON.stringify(part) ?? String(part)
  } catch {
    return String(part)
  }
}

export function formatLogMessage(message: unknown): string {
  const parts = Array.isArray(message) ? message : [message]
  return parts.map(formatPart).join(" ")
}

/** `[2024-01-02T03:04:05.678Z] INFO message` */
export function formatLogLine(date: Date, level: LogLevel.LogLevel, message: unknown): string {
  return `[${date.toISOString()}] ${level.label} ${formatLogMessage(message)}\n`
}

/**
 * Logger appending to `file`. Write failures are reported once on stderr
 * and then dropped.
 */
export const makeFileLogger = (file: string) => {
  let reported = false
  return Logger.make(({ date, logLevel, message }) => {
    try {
      fs.appendFileSync(file, formatLogLine(date, logLevel, message), "utf8")
    } catch (error) {
      if (!reported) {
        reported = true
        process.stderr.write(`paneflash: cannot write debug log ${file}: ${formatPart(error)}\n`)
      }
    }
  })
}

/** Layer installing the file logger at debug level */
export const fileLoggerLayer = (file: string) =>
  Layer.unwrapEffect(
    Effect.try(() => {
      fs.mkdirSync(path.dirname(file), { recursive: true })
      rotateLogFile(file)
      return Layer.merge(
        Logger.replace(Logger.defaultLogger, makeFileLogger(file)),
        Logger.minimumLogLevel(LogLevel.Debug)
      )
    }).pipe(
      Effect.catchAll((error) =>
        Effect.sync(() => {
          process.stderr.write(`paneflash: debug log disabled: ${formatPart(error.error)}\n`)
          return silentLoggerLayer
        })
      )
    )
  )

export const silentLoggerLayer = Logger.replace(Logger.defaultLogger, Logger.none)

/** File logger when `debug` is on, silence otherwise */
export const DebugLogLayer = Layer.unwrapEffect(
  Effect.map(FlashConfig, (config) =>
    config.debug ? fileLoggerLayer(config.debugLogPath) : silentLoggerLayer
  )
)
