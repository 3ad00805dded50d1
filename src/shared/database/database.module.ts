import { DynamicModule, Logger, Module } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm'
import type { EntitySchema } from 'typeorm'

type EntityClass = Function | EntitySchema

const IN_MEMORY = ':memory:'

/**
 * Database Module
 *
 * Opens the service's own TypeORM data source. Each service registers only
 * the entities it owns, so the user and order datasets never share a store.
 *
 * Backed by sql.js (sqlite compiled to WebAssembly). The default
 * DATABASE_PATH ':memory:' keeps the data for the lifetime of the process;
 * any other value names a file that is loaded on start and rewritten after
 * every change.
 */
@Module({})
export class DatabaseModule {
  static forRoot(entities: EntityClass[]): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [
        TypeOrmModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (configService: ConfigService): TypeOrmModuleOptions => {
            const location = configService.get<string>('config.database.path') ?? IN_MEMORY
            const inMemory = location === IN_MEMORY
            new Logger(DatabaseModule.name).log(`Opening sqlite database at ${location}`)

            return {
              type: 'sqljs',
              location: inMemory ? undefined : location,
              autoSave: !inMemory,
              entities,
              synchronize: configService.get<boolean>('config.database.synchronize') ?? true,
              logging:
                configService.get<string>('config.app.env') === 'development'
                  ? ['error', 'warn']
                  : ['error'],
            }
          },
        }),
      ],
    }
  }
}
