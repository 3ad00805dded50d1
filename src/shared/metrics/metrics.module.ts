import { Module } from '@nestjs/common'

import { MetricsController } from './metrics.controller'
import { MetricsInterceptor } from './metrics.interceptor'
import { MetricsService } from './metrics.service'

/**
 * Metrics Module
 *
 * Prometheus-compatible metrics collection.
 * MetricsInterceptor is exported so bootstrap can register it globally.
 */
@Module({
  controllers: [MetricsController],
  providers: [MetricsService, MetricsInterceptor],
  exports: [MetricsService, MetricsInterceptor],
})
export class MetricsModule {}
