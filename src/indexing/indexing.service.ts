import { Injectable, Logger } from '@nestjs/common';
import { SearchEngine } from '../index/search-engine';
import { IndexingOptions, IndexingSummary } from './interfaces/indexing.interface';
import { DocumentProcessorPool } from './services/document-processor.pool';
import { FileDiscoveryService } from './services/file-discovery.service';

/**
 * Builds the index: fans paths out to the worker pool and reduces the results
 * into the SearchEngine.
 *
 * The reduce loop below is the only caller of SearchEngine.addDocument. It
 * takes one result at a time, so every mutation of the index happens in
 * sequence without locking.
 */
@Injectable()
export class IndexingService {
  private readonly logger = new Logger(IndexingService.name);

  constructor(
    private readonly fileDiscovery: FileDiscoveryService,
    private readonly documentProcessorPool: DocumentProcessorPool,
    private readonly searchEngine: SearchEngine,
  ) {}

  /**
   * Index every regular file under `root`.
   * A directory scan failure rejects before anything is indexed.
   */
  async indexDirectory(root: string, options: IndexingOptions = {}): Promise<IndexingSummary> {
    const paths = await this.fileDiscovery.listFiles(root);
    return this.indexFiles(paths, options);
  }

  /**
   * Index the given files. Unreadable files are logged and skipped.
   */
  async indexFiles(paths: readonly string[], options: IndexingOptions = {}): Promise<IndexingSummary> {
    const startTime = Date.now();
    const summary: IndexingSummary = {
      filesDiscovered: paths.length,
      documentsIndexed: 0,
      documentsFailed: 0,
      workerCount: 0,
      durationMs: 0,
    };

    if (paths.length > 0) {
      const run = this.documentProcessorPool.run(paths, options);
      summary.workerCount = run.workerCount;

      // exactly one result arrives per path
      for (let received = 0; received < paths.length; received++) {
        const result = await run.results.shift();
        if (result === undefined) {
          throw new Error(`Result queue closed after ${received} of ${paths.length} results`);
        }

        if (!result.ok) {
          this.logger.warn(result.error.message);
          summary.documentsFailed++;
          continue;
        }

        this.searchEngine.addDocument(result.path, result.document.frequencies, result.document.totalTerms);
        summary.documentsIndexed++;
      }

      await run.completion;
    }

    summary.durationMs = Date.now() - startTime;
    this.logger.log(
      `Indexed ${summary.documentsIndexed} of ${summary.filesDiscovered} files ` +
        `(${summary.documentsFailed} failed) with ${summary.workerCount} workers in ${summary.durationMs}ms`,
    );

    return summary;
  }
}
