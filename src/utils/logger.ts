// src/utils/logger.ts
import chalk from 'chalk'

let verboseEnabled = false

export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled
}

export function timestamp(date: Date = new Date()): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0')
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`
}

// Everything goes to stderr so stdout stays free for piping
function write(line: string): void {
  console.error(`${chalk.dim(timestamp())} ${line}`)
}

export function log(message: string): void {
  write(message)
}

export function verbose(message: string): void {
  if (verboseEnabled) {
    write(chalk.dim(message))
  }
}

export function warn(message: string): void {
  write(chalk.yellow(message))
}

export function error(message: string): void {
  write(chalk.red(message))
}
