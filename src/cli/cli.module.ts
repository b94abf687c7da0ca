import { Module } from '@nestjs/common';
import { IndexingModule } from '../indexing/indexing.module';
import { SearchModule } from '../search/search.module';
import { IndexerCommand } from './indexer.command';

@Module({
  imports: [IndexingModule, SearchModule],
  providers: [IndexerCommand],
  exports: [IndexerCommand],
})
export class CliModule {}
