import { Module } from '@nestjs/common';
import { SearchEngine } from './search-engine';

@Module({
  providers: [SearchEngine],
  exports: [SearchEngine],
})
export class IndexModule {}
