import 'reflect-metadata'

import { bootstrap } from '../../bootstrap'
import { OrderServiceModule } from './order-service.module'

bootstrap(OrderServiceModule).catch((error: unknown) => {
  console.error('Failed to start order-service:', error)
  process.exitCode = 1
})
