import { Module } from '@nestjs/common';
import { DocumentModule } from '../document/document.module';
import { IndexModule } from '../index/index.module';
import { IndexingService } from './indexing.service';
import { DocumentProcessorPool } from './services/document-processor.pool';
import { FileDiscoveryService } from './services/file-discovery.service';

@Module({
  imports: [DocumentModule, IndexModule],
  providers: [FileDiscoveryService, DocumentProcessorPool, IndexingService],
  exports: [IndexingService],
})
export class IndexingModule {}
