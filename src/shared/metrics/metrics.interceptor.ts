import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor,
} from '@nestjs/common'
import type { Request, Response } from 'express'
import { Observable, tap } from 'rxjs'

import { MetricsService } from './metrics.service'

/**
 * Metrics Interceptor
 *
 * Records count and latency of every HTTP request, labelled by the
 * route pattern (not the concrete URL) to keep label cardinality bounded.
 */
@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metrics: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp()
    const request = http.getRequest<Request>()
    const response = http.getResponse<Response>()
    const startedAt = process.hrtime.bigint()

    const record = (status: number) => {
      const seconds = Number(process.hrtime.bigint() - startedAt) / 1e9
      const route = typeof request.route?.path === 'string' ? request.route.path : request.path
      this.metrics.recordRequest(request.method, route, status, seconds)
    }

    return next.handle().pipe(
      tap({
        next: () => record(response.statusCode),
        error: (error: unknown) =>
          record(error instanceof HttpException ? error.getStatus() : 500),
      })
    )
  }
}
