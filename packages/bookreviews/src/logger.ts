/**
 * Logger
 *
 * Leveled console logging with a context prefix.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export interface LoggerOptions {
  level?: LogLevel
  context?: string
  silent?: boolean
}

const priority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export class Logger {
  private readonly level: LogLevel
  private readonly context: string
  private readonly silent: boolean

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info"
    this.context = options.context ?? ""
    this.silent = options.silent ?? false
  }

  private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const ctx = this.context ? ` (${this.context})` : ""
    const suffix = data ? ` ${JSON.stringify(data)}` : ""
    return `[${level}]${ctx} ${message}${suffix}`
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && priority[level] >= priority[this.level]
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("debug")) console.log(this.format("debug", message, data))
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("info")) console.log(this.format("info", message, data))
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("warn")) console.warn(this.format("warn", message, data))
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog("error")) console.error(this.format("error", message, data))
  }

  /**
   * Plain output, used for report text.
   */
  log(message: string): void {
    if (!this.silent) console.log(message)
  }

  /**
   * Create a child logger with a nested context.
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
    })
  }
}

export function createLogger(context?: string, options?: Omit<LoggerOptions, "context">): Logger {
  return new Logger({ ...options, context })
}
