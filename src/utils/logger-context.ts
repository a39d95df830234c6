import { AsyncLocalStorage } from 'node:async_hooks'
import { logger as defaultLogger, type Logger } from './logger.js'

const loggerStorage = new AsyncLocalStorage<Logger>()

/**
 * Logger for the current call: the one installed by `withLogger`, else the default CLI logger.
 * Library code logs through this so MCP tool calls can route everything to stderr.
 */
export function getLogger(): Logger {
  return loggerStorage.getStore() ?? defaultLogger
}

/**
 * Run `fn` (and everything it awaits) with `logger` as the context logger
 */
export function withLogger<T>(logger: Logger, fn: () => T | Promise<T>): T | Promise<T> {
  return loggerStorage.run(logger, fn)
}
