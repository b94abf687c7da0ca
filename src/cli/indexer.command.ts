import { Injectable, Logger } from '@nestjs/common';
import { Readable, Writable } from 'stream';
import { describeError } from '../common/utils/error.utils';
import { IndexingService } from '../indexing/indexing.service';
import { QueryLoopService } from '../search/query-loop.service';
import { assertDirectory, parseArguments } from './cli-arguments';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * `corpus-indexer <directory>`: index the tree, then answer queries from
 * `input` until it ends.
 */
@Injectable()
export class IndexerCommand {
  private readonly logger = new Logger(IndexerCommand.name);

  constructor(
    private readonly indexingService: IndexingService,
    private readonly queryLoopService: QueryLoopService,
  ) {}

  /**
   * Resolves with the process exit code. Failures are logged, not thrown.
   */
  async run(args: readonly string[], input: Readable, output: Writable): Promise<number> {
    try {
      const root = parseArguments(args);
      await assertDirectory(root);
      await this.indexingService.indexDirectory(root);

      const answered = await this.queryLoopService.run(input, output);
      this.logger.debug(`Answered ${answered} queries`);
      return EXIT_SUCCESS;
    } catch (error) {
      this.logger.error(describeError(error));
      return EXIT_FAILURE;
    }
  }
}
