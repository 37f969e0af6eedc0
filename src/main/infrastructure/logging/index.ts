import pino from 'pino'
import { isDevelopment, isTest } from '@shared/utils/environment'

const isDevMode = isDevelopment()

function resolveLevel(): string {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase()
  if (configured && (configured === 'silent' || configured in pino.levels.values)) return configured
  if (isTest()) return 'silent'
  return isDevMode ? 'debug' : 'info'
}

const pinoLogger = pino({
  level: resolveLevel(),
  transport: isDevMode
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname'
        }
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label }
    }
  },
  base: {
    pid: process.pid,
    app: 'connscope'
  }
})

// Supports both: logger.info(msg, obj) and logger.info(obj, msg)
function createLogMethod(level: 'info' | 'warn' | 'error' | 'debug') {
  return (msgOrObj: string | object, objOrMsg?: object | string | unknown) => {
    if (typeof msgOrObj === 'string') {
      if (objOrMsg !== undefined) {
        if (objOrMsg instanceof Error) {
          pinoLogger[level]({ err: objOrMsg }, msgOrObj)
        } else if (typeof objOrMsg === 'object' && objOrMsg !== null) {
          pinoLogger[level](objOrMsg, msgOrObj)
        } else {
          pinoLogger[level]({ data: objOrMsg }, msgOrObj)
        }
      } else {
        pinoLogger[level](msgOrObj)
      }
    } else {
      if (objOrMsg && typeof objOrMsg === 'string') {
        pinoLogger[level](msgOrObj, objOrMsg)
      } else {
        pinoLogger[level](msgOrObj)
      }
    }
  }
}

export const logger = {
  info: createLogMethod('info'),
  warn: createLogMethod('warn'),
  error: createLogMethod('error'),
  debug: createLogMethod('debug'),
  child: pinoLogger.child.bind(pinoLogger),
  setLevel: (level: string): void => {
    pinoLogger.level = level
  }
}

export type Logger = typeof logger
