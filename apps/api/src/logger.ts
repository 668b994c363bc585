import pino, { type Logger, type LoggerOptions } from 'pino'
import type { Config } from './config.js'

// Shared by the Fastify request logger and the repository logger.
export function loggerOptions(config: Pick<Config, 'logLevel'>) {
  return {
    level: config.logLevel,
    formatters: {
      level: (label: string) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  } satisfies LoggerOptions
}

export function createLogger(config: Pick<Config, 'logLevel'>): Logger {
  return pino(loggerOptions(config))
}
