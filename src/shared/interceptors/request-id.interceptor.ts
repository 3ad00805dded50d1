import { randomUUID } from 'node:crypto'

import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common'
import type { Request, Response } from 'express'
import { Observable } from 'rxjs'

export const REQUEST_ID_HEADER = 'x-request-id'

/**
 * Request ID Interceptor
 *
 * Propagates the caller's x-request-id or generates one, and echoes it on
 * the response so a request can be followed across both services' logs.
 */
@Injectable()
export class RequestIdInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp()
    const request = http.getRequest<Request>()
    const response = http.getResponse<Response>()

    const incoming = request.headers[REQUEST_ID_HEADER]
    const requestId = typeof incoming === 'string' && incoming.length > 0 ? incoming : randomUUID()

    request.headers[REQUEST_ID_HEADER] = requestId
    response.setHeader(REQUEST_ID_HEADER, requestId)

    return next.handle()
  }
}
