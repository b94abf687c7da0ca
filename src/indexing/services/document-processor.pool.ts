import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as os from 'os';
import {
  DEFAULT_MAX_WORKERS,
  DEFAULT_MIN_WORKERS,
  DEFAULT_WORKERS_PER_CPU,
} from '../../config/indexer.config';
import { DocumentMapperService } from '../../document/document-mapper.service';
import { DocumentReadError } from '../../document/errors/document-read.error';
import { IndexingOptions, PoolRun } from '../interfaces/indexing.interface';
import { MapResult } from '../interfaces/map-result.interface';
import { AsyncQueue } from '../queue/async-queue';

/**
 * Bounded pool of map workers.
 *
 * Each worker is an async task that takes paths from a shared job queue, maps
 * the file and pushes exactly one result per path onto the result queue.
 * Workers never see the index; the caller drains the result queue and is the
 * only writer.
 */
@Injectable()
export class DocumentProcessorPool {
  private readonly logger = new Logger(DocumentProcessorPool.name);

  constructor(
    private readonly documentMapper: DocumentMapperService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Number of workers for `fileCount` files.
   *
   * Without an explicit count: available parallelism times workersPerCpu,
   * kept within [minWorkers, maxWorkers]. Many workers per CPU keep the CPUs
   * busy while reads are stalled; the upper bound limits open descriptors.
   * Either way there are never more workers than files.
   */
  chooseWorkerCount(fileCount: number, requested?: number): number {
    const fixed = requested ?? this.configService.get<number>('indexer.workers');
    let workers: number;

    if (fixed !== undefined) {
      workers = Math.max(1, Math.floor(fixed));
    } else {
      const perCpu = this.configService.get<number>('indexer.workersPerCpu', DEFAULT_WORKERS_PER_CPU);
      const min = this.configService.get<number>('indexer.minWorkers', DEFAULT_MIN_WORKERS);
      const max = this.configService.get<number>('indexer.maxWorkers', DEFAULT_MAX_WORKERS);
      workers = os.availableParallelism() * perCpu;
      workers = Math.max(workers, min);
      workers = Math.min(workers, max);
    }

    return Math.min(workers, Math.max(1, fileCount));
  }

  /**
   * Start mapping `paths`. The caller must take exactly `paths.length`
   * results from the returned queue; workers wait while it is full.
   */
  run(paths: readonly string[], options: IndexingOptions = {}): PoolRun {
    const workerCount = this.chooseWorkerCount(paths.length, options.workers);
    const jobs = new AsyncQueue<string>(0, 'jobs');
    const results = new AsyncQueue<MapResult>(workerCount, 'results');

    this.logger.debug(`Starting ${workerCount} workers for ${paths.length} files`);

    const workers = Array.from({ length: workerCount }, (_, workerId) =>
      this.runWorker(workerId, jobs, results),
    );

    const completion = Promise.all([this.submitJobs(paths, jobs), ...workers]).then(
      () => {
        results.close();
        this.logger.debug(`All ${workerCount} workers stopped`);
      },
      (error: unknown) => {
        jobs.close();
        results.close();
        throw error;
      },
    );

    return { workerCount, results, completion };
  }

  /**
   * One send per path, then close the job queue exactly once.
   */
  private async submitJobs(paths: readonly string[], jobs: AsyncQueue<string>): Promise<void> {
    try {
      for (const path of paths) {
        await jobs.push(path);
      }
    } finally {
      jobs.close();
    }
  }

  private async runWorker(
    workerId: number,
    jobs: AsyncQueue<string>,
    results: AsyncQueue<MapResult>,
  ): Promise<void> {
    let processed = 0;

    for await (const path of jobs) {
      await results.push(await this.mapPath(path));
      processed++;
    }

    this.logger.verbose(`Worker ${workerId} finished after ${processed} documents`);
  }

  private async mapPath(path: string): Promise<MapResult> {
    try {
      const document = await this.documentMapper.map(path);
      return { path, ok: true, document };
    } catch (error) {
      return {
        path,
        ok: false,
        error: error instanceof DocumentReadError ? error : new DocumentReadError(path, error),
      };
    }
  }
}
