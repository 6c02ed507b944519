/**
 * Console logger shared by the app.
 *
 * Every line carries a timestamp, level and module prefix:
 * `[12:04:55.120] [INFO ] [orupdate] Signed gen for 23456.002`
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type Logger = {
  debug: (message: string, data?: unknown) => void
  info: (message: string, data?: unknown) => void
  warn: (message: string, data?: unknown) => void
  error: (message: string, data?: unknown) => void
}

function formatLog(level: LogLevel, module: string, message: string): string {
  const timestamp = new Date().toISOString()
  const time = timestamp.split('T')[1]?.slice(0, 12) ?? timestamp
  return `[${time}] [${level.toUpperCase().padEnd(5)}] [${module}] ${message}`
}

export function createLogger(module: string): Logger {
  const log = (level: LogLevel, message: string, data?: unknown) => {
    const formatted = formatLog(level, module, message)
    const extra = data !== undefined ? [data] : []

    switch (level) {
      case 'debug':
        if (process.env.DEBUG) {
          console.log(formatted, ...extra)
        }
        break
      case 'info':
        console.log(formatted, ...extra)
        break
      case 'warn':
        console.warn(formatted, ...extra)
        break
      case 'error':
        console.error(formatted, ...extra)
        break
    }
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  }
}

export const serverLog = createLogger('server')
export const httpLog = createLogger('http')
