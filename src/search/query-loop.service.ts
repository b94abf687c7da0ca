import { Injectable, Logger } from '@nestjs/common';
import { once } from 'events';
import { createInterface } from 'readline';
import { Readable, Writable } from 'stream';
import { SearchService } from './search.service';

/**
 * Line-oriented query protocol: one term per input line, one result block
 * per term on the output, in input order.
 */
@Injectable()
export class QueryLoopService {
  private readonly logger = new Logger(QueryLoopService.name);

  constructor(private readonly searchService: SearchService) {}

  /**
   * Answer queries until `input` ends. Resolves with the number of queries
   * answered; blank lines are not counted.
   */
  async run(input: Readable, output: Writable): Promise<number> {
    const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });
    let answered = 0;

    try {
      for await (const line of lines) {
        const term = this.searchService.normalizeQuery(line);
        if (term === null) {
          continue;
        }

        const result = this.searchService.search(term);
        this.logger.debug(`Query "${term}" matched ${result.count} documents`);

        const block = this.searchService.formatResult(result).join('\n') + '\n';
        if (!output.write(block)) {
          await once(output, 'drain');
        }
        answered++;
      }
    } finally {
      lines.close();
    }

    return answered;
  }
}
