import { registerAs } from '@nestjs/config';

export const DEFAULT_MIN_WORKERS = 4;
export const DEFAULT_MAX_WORKERS = 32;
export const DEFAULT_WORKERS_PER_CPU = 4;
export const SUPPORTED_ENCODINGS = ['utf8', 'utf-8', 'latin1', 'ascii', 'utf16le'] as const;

export type DocumentEncoding = (typeof SUPPORTED_ENCODINGS)[number];

export interface IndexerConfig {
  /** Fixed worker count; when unset the count is derived from the CPU count */
  workers?: number;
  minWorkers: number;
  maxWorkers: number;
  workersPerCpu: number;
  encoding: DocumentEncoding;
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function parseEncoding(value: string | undefined): DocumentEncoding {
  return SUPPORTED_ENCODINGS.find(encoding => encoding === value) ?? 'utf8';
}

export default registerAs(
  'indexer',
  (): IndexerConfig => ({
    workers: parsePositiveInt(process.env.INDEXER_WORKERS),
    minWorkers: parsePositiveInt(process.env.INDEXER_MIN_WORKERS) ?? DEFAULT_MIN_WORKERS,
    maxWorkers: parsePositiveInt(process.env.INDEXER_MAX_WORKERS) ?? DEFAULT_MAX_WORKERS,
    workersPerCpu: parsePositiveInt(process.env.INDEXER_WORKERS_PER_CPU) ?? DEFAULT_WORKERS_PER_CPU,
    encoding: parseEncoding(process.env.INDEXER_FILE_ENCODING),
  }),
);
