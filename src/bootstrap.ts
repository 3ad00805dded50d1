import { INestApplication, Type } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { NestFactory } from '@nestjs/core'

import { GlobalExceptionFilter } from './shared/filters'
import { RequestIdInterceptor } from './shared/interceptors'
import { AppLogger } from './shared/logger'
import { MetricsInterceptor } from './shared/metrics'
import { GlobalValidationPipe } from './shared/pipes'

/**
 * Apply the HTTP setup every service shares
 *
 * Used by bootstrap and by the e2e tests, so both run the same pipeline.
 */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService)
  const apiPrefix = configService.get<string>('config.app.apiPrefix') ?? 'api'

  // All routes are prefixed (e.g. /api/orders); health and metrics are not
  if (apiPrefix) {
    app.setGlobalPrefix(apiPrefix, {
      exclude: ['health', 'health/live', 'health/ready', 'metrics'],
    })
  }

  app.enableCors({
    origin: configService.get<string>('config.cors.origin') ?? '*',
    methods: ['GET', 'POST', 'OPTIONS'],
  })

  app.useGlobalPipes(new GlobalValidationPipe())
  app.useGlobalFilters(new GlobalExceptionFilter())
  app.useGlobalInterceptors(
    new RequestIdInterceptor(), // First: Add request ID for tracing
    app.get(MetricsInterceptor) // Second: Record metrics
  )
}

/**
 * Bootstrap a service
 *
 * 1. Create the Nest application from the service's root module
 * 2. Install the pino-backed logger
 * 3. Register global pipes, filters and interceptors
 * 4. Enable graceful shutdown
 * 5. Start listening on the configured port
 */
export async function bootstrap(rootModule: Type<unknown>): Promise<INestApplication> {
  const app = await NestFactory.create(rootModule, {
    bufferLogs: true,
  })

  const configService = app.get(ConfigService)
  const port = configService.get<number>('config.app.port') ?? 3000
  const serviceName = configService.get<string>('config.service.name')
  const serviceVersion = configService.get<string>('config.service.version')

  const logger = app.get(AppLogger)
  logger.setContext('Bootstrap')
  app.useLogger(logger)

  configureApp(app)

  // Closes the data source and Redis connection on SIGTERM/SIGINT
  app.enableShutdownHooks()

  await app.listen(port)

  logger.log(`${serviceName} v${serviceVersion} is running on port ${port}`)
  logger.log(`Metrics available at: http://localhost:${port}/metrics`)
  logger.log(`Health check available at: http://localhost:${port}/health`)

  return app
}
