import { AsyncQueue } from '../queue/async-queue';
import { MapResult } from './map-result.interface';

export interface IndexingOptions {
  /**
   * Fixed number of workers for this run. Bypasses the CPU-based bounds but
   * is still capped by the number of files.
   */
  workers?: number;
}

export interface IndexingSummary {
  filesDiscovered: number;
  documentsIndexed: number;
  documentsFailed: number;
  workerCount: number;
  durationMs: number;
}

/**
 * A running map phase.
 */
export interface PoolRun {
  workerCount: number;

  /** One result per submitted path, in completion order */
  results: AsyncQueue<MapResult>;

  /** Settles once every worker has exited and `results` is closed */
  completion: Promise<void>;
}
