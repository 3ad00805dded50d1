import { plainToInstance } from 'class-transformer'
import {
  IsBooleanString,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator'

/**
 * Environment Variables Validation Schema
 *
 * Validates that environment variables are correctly typed.
 * The application will fail to start if validation fails.
 *
 * No property carries a default here: ConfigModule writes validated values
 * back into process.env, which would shadow the per-service defaults.
 */

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
  Staging = 'staging',
}

export class EnvironmentVariables {
  @IsString()
  @IsOptional()
  SERVICE_NAME?: string

  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV?: Environment

  @IsInt()
  @Min(0)
  @Max(65_535)
  @IsOptional()
  PORT?: number

  @IsString()
  @IsOptional()
  API_PREFIX?: string

  @IsString()
  @IsOptional()
  CORS_ORIGIN?: string

  @IsString()
  @IsOptional()
  DATABASE_PATH?: string

  @IsBooleanString()
  @IsOptional()
  DATABASE_SYNCHRONIZE?: string

  @IsUrl({ require_tld: false, require_protocol: true })
  @IsOptional()
  USER_SERVICE_URL?: string

  @IsInt()
  @Min(1)
  @IsOptional()
  USER_SERVICE_TIMEOUT_MS?: number

  @IsBooleanString()
  @IsOptional()
  ENABLE_MESSAGING?: string

  @IsString()
  @IsOptional()
  REDIS_HOST?: string

  @IsInt()
  @IsOptional()
  REDIS_PORT?: number

  @IsString()
  @IsOptional()
  REDIS_PASSWORD?: string

  @IsString()
  @IsOptional()
  REDIS_KEY_PREFIX?: string

  @IsBooleanString()
  @IsOptional()
  METRICS_ENABLED?: string

  @IsString()
  @IsOptional()
  LOG_LEVEL?: string

  @IsBooleanString()
  @IsOptional()
  ENABLE_CONSOLE_LOGS?: string
}

/**
 * Validate environment variables
 *
 * @param config - Raw environment variables
 * @returns Validated configuration
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  })

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  })

  if (errors.length > 0) {
    throw new Error(errors.toString())
  }

  return validatedConfig
}
