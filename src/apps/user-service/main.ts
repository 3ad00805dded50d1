import 'reflect-metadata'

import { bootstrap } from '../../bootstrap'
import { UserServiceModule } from './user-service.module'

bootstrap(UserServiceModule).catch((error: unknown) => {
  console.error('Failed to start user-service:', error)
  process.exitCode = 1
})
