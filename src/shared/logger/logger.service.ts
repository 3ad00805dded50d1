import { Inject, Injectable, LoggerService } from '@nestjs/common'
import type { Logger as PinoLogger } from 'pino'

export const PINO_LOGGER = Symbol('PINO_LOGGER')

type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/**
 * App Logger
 *
 * Structured JSON logging for Nest, backed by pino.
 * Nest passes the context as the last string argument (and a stack trace
 * before it for errors); both are lifted into log fields.
 */
@Injectable()
export class AppLogger implements LoggerService {
  private context?: string

  constructor(@Inject(PINO_LOGGER) private readonly pino: PinoLogger) {}

  setContext(context: string): void {
    this.context = context
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams)
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams)
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams)
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams)
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('trace', message, optionalParams)
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write('fatal', message, optionalParams)
  }

  private write(level: Level, message: unknown, optionalParams: unknown[]): void {
    const params = [...optionalParams]
    let context = this.context

    const last = params.at(-1)
    if (params.length > 0 && typeof last === 'string') {
      context = last
      params.pop()
    }

    const fields: Record<string, unknown> = { context }

    for (const param of params) {
      if (param instanceof Error) {
        fields.err = param
      } else if (typeof param === 'string') {
        // Nest hands over error stacks as plain strings
        fields.stack = param
      } else if (param !== undefined) {
        fields.detail = param
      }
    }

    if (message instanceof Error) {
      this.pino[level]({ ...fields, err: message }, message.message)
      return
    }

    if (typeof message === 'object' && message !== null) {
      this.pino[level]({ ...fields, ...message })
      return
    }

    this.pino[level](fields, String(message))
  }
}
