import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export enum Environment {
  DEVELOPMENT = 'development',
  PRODUCTION = 'production',
  TEST = 'test',
}

/**
 * Policy applied when a usage-based task also carries a calendar interval
 */
export enum DualLimitPolicy {
  USAGE_ONLY = 'usage-only',
  EARLIEST = 'earliest',
}

/**
 * Environment schema validated once at boot by ConfigModule.
 * Defaults below apply when a variable is not set.
 */
export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.DEVELOPMENT;

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT = 3000;

  // ============ DATABASE ============

  @IsString()
  @IsNotEmpty()
  DB_HOST = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT = 5432;

  @IsString()
  DB_USERNAME = 'postgres';

  @IsString()
  DB_PASSWORD = 'postgres';

  @IsString()
  @IsNotEmpty()
  DB_NAME = 'crane_maintenance';

  @IsBooleanString()
  DB_SSL = 'false';

  // ============ INGESTION ============

  @IsString()
  @IsNotEmpty()
  LOG_DIRECTORY = './logs';

  @IsString()
  @IsNotEmpty()
  TAG_SEARCH_FILE = './data/TAG_SEARCH.txt';

  @IsString()
  @IsNotEmpty()
  TAG_CHANGE_FILE = './data/TAG_CHANGE.csv';

  @IsString()
  @IsNotEmpty()
  TASK_CONFIG_FILE = './data/service_config.csv';

  @IsString()
  @IsNotEmpty()
  EQUIPMENT_PREFIX = 'RMG';

  @IsInt()
  @Min(0)
  @Max(99)
  EQUIPMENT_RANGE_START = 1;

  @IsInt()
  @Min(0)
  @Max(99)
  EQUIPMENT_RANGE_END = 12;

  @IsString()
  @IsNotEmpty()
  STATIC_PREFIX = 'CRANE.STATISTIC';

  @IsString()
  @IsNotEmpty()
  STATISTIC_TYPE = 'Perma';

  @IsInt()
  @Min(1)
  INGEST_MAX_FILES = 9999;

  // ============ PREDICTION ============

  @IsEnum(DualLimitPolicy)
  PREDICTION_DUAL_LIMIT_POLICY: DualLimitPolicy = DualLimitPolicy.USAGE_ONLY;
}

export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((e) => Object.values(e.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  if (validated.EQUIPMENT_RANGE_START > validated.EQUIPMENT_RANGE_END) {
    throw new Error(
      'Invalid environment configuration: EQUIPMENT_RANGE_START must not exceed EQUIPMENT_RANGE_END',
    );
  }

  return validated;
}
