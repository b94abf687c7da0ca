import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Min, validateSync } from 'class-validator';
import { LOG_LEVELS } from '../common/logger/stderr.logger';
import { SUPPORTED_ENCODINGS } from './indexer.config';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  INDEXER_WORKERS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  INDEXER_MIN_WORKERS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  INDEXER_MAX_WORKERS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  INDEXER_WORKERS_PER_CPU?: number;

  @IsOptional()
  @IsIn([...SUPPORTED_ENCODINGS])
  INDEXER_FILE_ENCODING?: string;

  @IsOptional()
  @IsIn([...LOG_LEVELS])
  LOG_LEVEL?: string;
}

/**
 * Validate the environment for ConfigModule. The error lists every violated
 * constraint.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const { INDEXER_MIN_WORKERS: min, INDEXER_MAX_WORKERS: max } = validated;
  if (min !== undefined && max !== undefined && min > max) {
    throw new Error(`Invalid configuration: INDEXER_MIN_WORKERS (${min}) exceeds INDEXER_MAX_WORKERS (${max})`);
  }

  return validated;
}
