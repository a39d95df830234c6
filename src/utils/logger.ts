import chalk, { Chalk, type ChalkInstance } from 'chalk'

export interface LoggerOptions {
  prefix?: string
  timestamp?: boolean
  silent?: boolean
  forceColor?: boolean | undefined | null
  debug?: boolean
}

export interface Logger {
  info: (message: string, ...args: unknown[]) => void
  success: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
  debug: (message: string, ...args: unknown[]) => void
  setDebug: (enabled: boolean) => void
  isDebugEnabled: () => boolean
}

type Level = 'info' | 'success' | 'warn' | 'error' | 'debug'

const LEVEL_STYLE: Record<Level, { emoji: string; color: (chalk: ChalkInstance) => (text: string) => string }> = {
  info: { emoji: '🗂️ ', color: (c) => c.blue },
  success: { emoji: '✅', color: (c) => c.green },
  warn: { emoji: '⚠️ ', color: (c) => c.yellow },
  error: { emoji: '❌', color: (c) => c.red },
  debug: { emoji: '🔍', color: (c) => c.gray },
}

let globalDebugEnabled = false

export function formatMessage(message: string, ...args: unknown[]): string {
  const formattedArgs = args.map((arg) => (typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)))
  return formattedArgs.length > 0 ? `${message} ${formattedArgs.join(' ')}` : message
}

type Sink = (line: string) => void

/* eslint-disable no-console */
const toStdout: Sink = (line) => console.log(line)
const toStderr: Sink = (line) => console.error(line)
/* eslint-enable no-console */

/**
 * Build a logger writing info/success/debug to `out` and warn/error to stderr.
 * A logger without its own debug flag follows the global one set by `logger.setDebug`.
 */
function buildLogger(out: Sink, options: LoggerOptions): Logger {
  const { prefix = '', timestamp = false, silent = false, forceColor } = options
  let localDebug: boolean | undefined = options.debug
  const colors = forceColor !== undefined && forceColor !== null ? new Chalk({ level: forceColor ? 3 : 0 }) : new Chalk({ level: chalk.level })
  const prefixStr = prefix ? `[${prefix}] ` : ''

  const isDebugEnabled = (): boolean => localDebug ?? globalDebugEnabled

  const write = (level: Level, sink: Sink) => (message: string, ...args: unknown[]): void => {
    if (silent || (level === 'debug' && !isDebugEnabled())) return
    const text = `${timestamp ? `[${new Date().toISOString()}] ` : ''}${prefixStr}${formatMessage(message, ...args)}`
    if (!text.trim()) return
    const style = LEVEL_STYLE[level]
    sink(style.color(colors)(`${style.emoji} ${text}`))
  }

  return {
    info: write('info', out),
    success: write('success', out),
    warn: write('warn', toStderr),
    error: write('error', toStderr),
    debug: write('debug', out),
    setDebug: (enabled: boolean): void => {
      localDebug = enabled
    },
    isDebugEnabled,
  }
}

/**
 * Default CLI logger. `setDebug` here switches debug output for every logger without its own flag.
 */
export const logger: Logger = {
  ...buildLogger(toStdout, {}),
  setDebug: (enabled: boolean): void => {
    globalDebugEnabled = enabled
  },
  isDebugEnabled: (): boolean => globalDebugEnabled,
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return buildLogger(toStdout, options)
}

/**
 * Logger sending every level to stderr. The MCP server uses it since stdout carries the protocol,
 * and the convert command so the ADF JSON on stdout can be piped.
 */
export function createStderrLogger(options: LoggerOptions = {}): Logger {
  return buildLogger(toStderr, options)
}

export default logger
