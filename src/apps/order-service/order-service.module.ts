import { Module } from '@nestjs/common'
import { ConfigModule } from '@nestjs/config'

import { AppController } from '../../app.controller'
import { environmentConfig, validate } from '../../config'
import { Order, OrdersModule } from '../../modules/orders'
import { DatabaseModule } from '../../shared/database'
import { HealthModule } from '../../shared/health'
import { LoggerModule } from '../../shared/logger'
import { MessagingModule } from '../../shared/messaging'
import { MetricsModule } from '../../shared/metrics'

/**
 * Order Service Module
 *
 * Root module of the order service. Owns the orders store and reaches
 * the user service over HTTP (USER_SERVICE_URL).
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [environmentConfig({ name: 'order-service', port: 8082 })],
      validate,
    }),
    LoggerModule.forRoot(),
    DatabaseModule.forRoot([Order]),
    MessagingModule.forRoot(),
    HealthModule,
    MetricsModule,
    OrdersModule,
  ],
  controllers: [AppController],
})
export class OrderServiceModule {}
