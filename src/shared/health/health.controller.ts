import { Controller, Get } from '@nestjs/common'
import {
  HealthCheck,
  HealthCheckService,
  MemoryHealthIndicator,
  TypeOrmHealthIndicator,
} from '@nestjs/terminus'

import { RedisHealthIndicator } from './redis.health'

const HEAP_LIMIT_BYTES = 300 * 1024 * 1024
const RSS_LIMIT_BYTES = 500 * 1024 * 1024

/**
 * Health Check Controller
 *
 * Endpoints:
 * - GET /health/live: Liveness probe (is the process running?)
 * - GET /health/ready: Readiness probe (are this service's own dependencies up?)
 * - GET /health: Comprehensive health check
 *
 * Readiness covers only this service's own store and Redis; peer services
 * are not probed.
 */
@Controller('health')
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private memory: MemoryHealthIndicator,
    private database: TypeOrmHealthIndicator,
    private redis: RedisHealthIndicator
  ) {}

  @Get('live')
  @HealthCheck()
  checkLiveness() {
    return this.health.check([async () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)])
  }

  @Get('ready')
  @HealthCheck()
  checkReadiness() {
    return this.health.check([
      () => this.database.pingCheck('database'),
      () => this.redis.isHealthy('redis'),
    ])
  }

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.memory.checkRSS('memory_rss', RSS_LIMIT_BYTES),
      () => this.database.pingCheck('database'),
      // Redis check (soft failure for /health)
      async () => {
        try {
          return await this.redis.isHealthy('redis')
        } catch (error) {
          return {
            redis: {
              status: 'up' as const,
              degraded: true,
              message: error instanceof Error ? error.message : 'Redis check failed',
            },
          }
        }
      },
    ])
  }
}
