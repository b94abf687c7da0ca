import { Module } from '@nestjs/common';
import { IndexModule } from '../index/index.module';
import { QueryLoopService } from './query-loop.service';
import { SearchService } from './search.service';

@Module({
  imports: [IndexModule],
  providers: [SearchService, QueryLoopService],
  exports: [SearchService, QueryLoopService],
})
export class SearchModule {}
