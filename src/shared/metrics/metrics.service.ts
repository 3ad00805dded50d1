import { Injectable } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { Counter, Histogram, Registry } from 'prom-client'

/**
 * Metrics Service
 *
 * Owns a Prometheus registry for this service instance and the
 * HTTP request metrics recorded by MetricsInterceptor.
 */
@Injectable()
export class MetricsService {
  readonly enabled: boolean
  private readonly registry = new Registry()
  private readonly requestsTotal: Counter<'method' | 'route' | 'status'>
  private readonly requestDuration: Histogram<'method' | 'route' | 'status'>

  constructor(configService: ConfigService) {
    this.enabled = configService.get<boolean>('config.metrics.enabled') ?? true
    this.registry.setDefaultLabels({
      service: configService.get<string>('config.service.name') ?? 'microservice',
    })

    this.requestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    })

    this.requestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'route', 'status'],
      buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
      registers: [this.registry],
    })
  }

  recordRequest(method: string, route: string, status: number, durationSeconds: number): void {
    if (!this.enabled) {
      return
    }

    const labels = { method, route, status: String(status) }
    this.requestsTotal.inc(labels)
    this.requestDuration.observe(labels, durationSeconds)
  }

  get contentType(): string {
    return this.registry.contentType
  }

  async render(): Promise<string> {
    return this.registry.metrics()
  }
}
