import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileHandle, open } from 'fs/promises';
import { createInterface } from 'readline';
import { TermAnalyzer } from '../analysis/analyzers/term.analyzer';
import { describeError } from '../common/utils/error.utils';
import { DocumentEncoding } from '../config/indexer.config';
import { DocumentReadError } from './errors/document-read.error';
import { DocumentTerms } from './interfaces/document.interface';

/**
 * Map phase of indexing: turns one file into its term counts.
 *
 * The file is streamed line by line, so memory use is bounded by the longest
 * line rather than the file size. The service holds no state between calls
 * and may be used by any number of workers at once.
 */
@Injectable()
export class DocumentMapperService {
  private readonly logger = new Logger(DocumentMapperService.name);
  private readonly encoding: DocumentEncoding;

  constructor(
    private readonly analyzer: TermAnalyzer,
    configService: ConfigService,
  ) {
    this.encoding = configService.get<DocumentEncoding>('indexer.encoding', 'utf8');
  }

  /**
   * Count the terms of the file at `path`.
   * Rejects with DocumentReadError when the file cannot be opened or read.
   */
  async map(path: string): Promise<DocumentTerms> {
    const frequencies = new Map<string, number>();
    let totalTerms = 0;

    let handle: FileHandle;
    try {
      handle = await open(path, 'r');
    } catch (error) {
      throw new DocumentReadError(path, error);
    }

    const lines = createInterface({
      input: handle.createReadStream({ encoding: this.encoding }),
      crlfDelay: Infinity,
    });

    try {
      for await (const line of lines) {
        for (const term of this.analyzer.analyze(line)) {
          frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
          totalTerms++;
        }
      }
    } catch (error) {
      throw new DocumentReadError(path, error);
    } finally {
      lines.close();
      await handle.close().catch((error: unknown) => {
        // the stream may already have closed the descriptor
        this.logger.debug(`Closing ${path} failed: ${describeError(error)}`);
      });
    }

    this.logger.verbose(`Mapped ${path}: ${totalTerms} terms, ${frequencies.size} distinct`);
    return { frequencies, totalTerms };
  }
}
