import { DynamicModule, Global, Module } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import pino, { Logger, LoggerOptions } from 'pino'

import { AppLogger, PINO_LOGGER } from './logger.service'

/**
 * Build the root pino instance from the logging configuration
 *
 * Development gets human-readable output through pino-pretty;
 * every other environment writes newline-delimited JSON to stdout.
 */
export const createPinoLogger = (configService: ConfigService): Logger => {
  const env = configService.get<string>('config.app.env') ?? 'development'
  const enableConsole = configService.get<boolean>('config.logging.enableConsole') ?? true

  const options: LoggerOptions = {
    name: configService.get<string>('config.service.name'),
    level: enableConsole ? (configService.get<string>('config.logging.level') ?? 'info') : 'silent',
    base: {
      service: configService.get<string>('config.service.name'),
      version: configService.get<string>('config.service.version'),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  }

  if (env === 'development' && enableConsole) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' },
    }
  }

  return pino(options)
}

/**
 * Logger Module
 *
 * Global module so every feature module can inject AppLogger.
 */
@Global()
@Module({})
export class LoggerModule {
  static forRoot(): DynamicModule {
    return {
      module: LoggerModule,
      providers: [
        {
          provide: PINO_LOGGER,
          useFactory: createPinoLogger,
          inject: [ConfigService],
        },
        AppLogger,
      ],
      exports: [PINO_LOGGER, AppLogger],
    }
  }
}
