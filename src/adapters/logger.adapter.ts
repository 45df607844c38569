export type LogMeta = Record<string, unknown>

export interface LoggerAdapter {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
}

const LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']

type WritableLevel = 'debug' | 'info' | 'warn' | 'error'

export class ConsoleLoggerAdapter implements LoggerAdapter {
  private readonly normalizedLevel: string

  constructor(level: string) {
    this.normalizedLevel = level.toLowerCase()
  }

  private shouldLog(level: WritableLevel): boolean {
    if (this.normalizedLevel === 'silent') return false
    const cur = LEVEL_ORDER.indexOf(this.normalizedLevel)
    if (cur === -1) return true
    return LEVEL_ORDER.indexOf(level) >= cur
  }

  private write(level: WritableLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) return
    const line = JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...meta })
    /* eslint-disable no-console */
    switch (level) {
      case 'debug':
        console.debug(line)
        break
      case 'info':
        console.log(line)
        break
      case 'warn':
        console.warn(line)
        break
      case 'error':
        console.error(line)
        break
    }
    /* eslint-enable no-console */
  }

  public debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta)
  }

  public info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta)
  }

  public warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta)
  }

  public error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta)
  }
}
