import { HttpModule } from '@nestjs/axios'
import { Module } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { TypeOrmModule } from '@nestjs/typeorm'

import { OrdersController } from './controllers'
import { Order } from './entities'
import { OrdersService } from './services'
import { HttpUserLookup, USER_LOOKUP } from './user-lookup'

/**
 * Orders Module
 *
 * Feature module of the order service:
 * - REST API endpoints (OrdersController)
 * - Business logic (OrdersService)
 * - User validation over HTTP (HttpUserLookup behind USER_LOOKUP)
 *
 * The HTTP client is configured once from config.services.userService.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Order]),
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        baseURL: configService.get<string>('config.services.userService.url'),
        timeout: configService.get<number>('config.services.userService.timeoutMs') ?? 3000,
        headers: { Accept: 'application/json' },
      }),
    }),
  ],
  controllers: [OrdersController],
  providers: [OrdersService, { provide: USER_LOOKUP, useClass: HttpUserLookup }],
  exports: [OrdersService],
})
export class OrdersModule {}
