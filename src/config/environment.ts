import { registerAs } from '@nestjs/config'

/**
 * Per-service defaults
 *
 * Both services share one configuration shape; only their identity and
 * listening port differ when nothing is set in the environment.
 */
export interface ServiceDefaults {
  name: string
  port: number
}

/**
 * Environment Configuration
 *
 * Centralizes all environment variables for a service. The factory runs once
 * when the root module is built; request handling only ever reads the result
 * through ConfigService.
 */
export const environmentConfig = (defaults: ServiceDefaults) =>
  registerAs('config', () => ({
    // Service Information
    // These help identify the service in logs and metrics
    service: {
      name: process.env.SERVICE_NAME || defaults.name,
      version: process.env.npm_package_version || '0.0.0',
    },

    // Application Settings
    app: {
      env: process.env.NODE_ENV || 'development',
      port: Number.parseInt(process.env.PORT || String(defaults.port), 10),
      apiPrefix: process.env.API_PREFIX ?? 'api',
    },

    cors: {
      origin: process.env.CORS_ORIGIN || '*',
    },

    // Each service owns its own store; nothing is shared between them
    database: {
      path: process.env.DATABASE_PATH || ':memory:',
      synchronize: process.env.DATABASE_SYNCHRONIZE !== 'false',
    },

    // Redis Configuration
    // Used for publishing domain events to streams
    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: Number.parseInt(process.env.REDIS_PORT || '6379', 10),
      password: process.env.REDIS_PASSWORD,
      // Key prefix helps avoid collisions in shared Redis instances
      keyPrefix: process.env.REDIS_KEY_PREFIX || 'micro:',
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      enableOfflineQueue: true,
    },

    metrics: {
      enabled: process.env.METRICS_ENABLED !== 'false', // Enabled by default
    },

    logging: {
      level: process.env.LOG_LEVEL || 'info',
      enableConsole: process.env.ENABLE_CONSOLE_LOGS !== 'false',
    },

    // Peer services reached over HTTP
    services: {
      userService: {
        url: process.env.USER_SERVICE_URL || 'http://localhost:8081/api',
        timeoutMs: Number.parseInt(process.env.USER_SERVICE_TIMEOUT_MS || '3000', 10),
      },
    },

    // Feature Flags
    features: {
      enableMessaging: process.env.ENABLE_MESSAGING === 'true',
    },
  }))

export type RedisConfig = {
  host: string
  port: number
  password?: string
  keyPrefix: string
  maxRetriesPerRequest: number
  enableReadyCheck: boolean
  enableOfflineQueue: boolean
}
