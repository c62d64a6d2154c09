import chalk from 'chalk'
import type { LogLevel } from './types'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

const ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 }

const STYLE: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: text => chalk.dim(text),
  info: text => text,
  warn: text => chalk.yellow(text),
  error: text => chalk.red(text),
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.keys(ORDER).includes(value)
}

function stderrLine(line: string): void {
  process.stderr.write(`${line}\n`)
}

export function createLogger(level: LogLevel, write: (line: string) => void = stderrLine): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string) => {
    if (ORDER[at] < ORDER[level]) {
      return
    }
    write(STYLE[at](`${at}: ${message}`))
  }

  return {
    debug: message => emit('debug', message),
    info: message => emit('info', message),
    warn: message => emit('warn', message),
    error: message => emit('error', message),
  }
}
