import { Controller, Get, Res } from '@nestjs/common'
import type { Response } from 'express'

import { MetricsService } from './metrics.service'

/**
 * Metrics Controller
 *
 * Exposes the Prometheus scrape endpoint at GET /metrics
 * (excluded from the global API prefix).
 */
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metrics: MetricsService) {}

  @Get()
  async scrape(@Res() response: Response): Promise<void> {
    response.set('Content-Type', this.metrics.contentType)
    response.send(await this.metrics.render())
  }
}
