/* eslint-disable no-console */
import type { Readable, Writable } from 'node:stream'
import process from 'node:process'
import readline from 'node:readline'
import { userInterrupted } from './interrupt'

export const VERSION_PATTERN: RegExp = /^\d+\.\d+\.\d+$/

/**
 * Check if a string is a plain `MAJOR.MINOR.PATCH` version
 */
export function isValidVersion(version: string): boolean {
  return VERSION_PATTERN.test(version)
}

export interface PromptStreams {
  input?: Readable
  output?: Writable
}

/**
 * Ask a question and resolve with the trimmed answer line
 */
export function prompt(question: string, streams: PromptStreams = {}): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: streams.input ?? process.stdin,
      output: streams.output ?? process.stdout,
    })

    let answered = false
    rl.question(`${question} `, (answer: string) => {
      answered = true
      rl.close()
      resolve(answer.trim())
    })

    // readline swallows Ctrl+C in a terminal; record it for the caller to act on
    rl.on('SIGINT', () => {
      userInterrupted.value = true
      rl.close()
    })

    // stdin closed before a line arrived counts as an empty answer
    rl.on('close', () => {
      if (!answered)
        resolve('')
    })
  })
}

/**
 * Console symbols for better output
 */
export const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  step: '🔄',
  checkmark: '✅',
}

/**
 * Colorize console output (simple ANSI colors)
 */
export const colors = {
  green: (text: string) => `\x1B[32m${text}\x1B[0m`,
  red: (text: string) => `\x1B[31m${text}\x1B[0m`,
  yellow: (text: string) => `\x1B[33m${text}\x1B[0m`,
  blue: (text: string) => `\x1B[34m${text}\x1B[0m`,
  gray: (text: string) => `\x1B[90m${text}\x1B[0m`,
}

/**
 * Step logger, prefixes the line when nothing is being written
 */
export function logStep(emoji: string, message: string, isDryRun = false): void {
  const prefix = isDryRun ? '[DRY RUN] ' : ''
  console.log(`${emoji} ${prefix}${message}`)
}

export interface Logger {
  step: (message: string) => void
  info: (message: string) => void
  success: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
  /**
   * Plain line, e.g. a listed artifact
   */
  line: (message?: string) => void
}

/**
 * Operator-facing output. Quiet mode keeps warnings and errors only.
 */
export function createLogger(options: { quiet?: boolean, dryRun?: boolean } = {}): Logger {
  const { quiet = false, dryRun = false } = options

  return {
    step(message) {
      if (!quiet)
        logStep(symbols.step, colors.blue(message), dryRun)
    },
    info(message) {
      if (!quiet)
        console.log(colors.blue(`${symbols.info} ${message}`))
    },
    success(message) {
      if (!quiet)
        console.log(colors.green(`${symbols.success} ${message}`))
    },
    warn(message) {
      console.warn(colors.yellow(`${symbols.warning} ${message}`))
    },
    error(message) {
      console.error(colors.red(`${symbols.error} ${message}`))
    },
    line(message = '') {
      if (!quiet)
        console.log(message)
    },
  }
}
