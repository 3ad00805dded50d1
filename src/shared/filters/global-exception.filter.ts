import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common'
import type { Request, Response } from 'express'

import { REQUEST_ID_HEADER } from '../interceptors'

export type ErrorResponseBody = {
  statusCode: number
  message: string | string[]
  error: string
  errors?: unknown
  path: string
  timestamp: string
  requestId?: string
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

/**
 * Global Exception Filter
 *
 * Gives every failed request the same JSON error shape.
 * HttpExceptions keep their status and message; anything else is a 500
 * whose details stay in the logs.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name)

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp()
    const request = http.getRequest<Request>()
    const response = http.getResponse<Response>()

    const body = this.toBody(exception, request)

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed with ${body.statusCode}`,
        exception instanceof Error ? exception.stack : String(exception)
      )
    } else {
      this.logger.warn(`${request.method} ${request.url} -> ${body.statusCode}: ${String(body.message)}`)
    }

    response.status(body.statusCode).json(body)
  }

  private toBody(exception: unknown, request: Request): ErrorResponseBody {
    const header = request.headers[REQUEST_ID_HEADER]
    const base = {
      path: request.url,
      timestamp: new Date().toISOString(),
      requestId: typeof header === 'string' ? header : undefined,
    }

    if (!(exception instanceof HttpException)) {
      return {
        ...base,
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Internal server error',
        error: 'Internal Server Error',
      }
    }

    const statusCode = exception.getStatus()
    const payload = exception.getResponse()

    if (!isRecord(payload)) {
      return { ...base, statusCode, message: String(payload), error: exception.name }
    }

    const message = payload.message
    return {
      ...base,
      statusCode,
      message:
        typeof message === 'string' || Array.isArray(message) ? message : exception.message,
      error: typeof payload.error === 'string' ? payload.error : exception.name,
      ...(payload.errors === undefined ? {} : { errors: payload.errors }),
    }
  }
}
