import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { DocumentMapperService } from './document-mapper.service';

@Module({
  imports: [AnalysisModule],
  providers: [DocumentMapperService],
  exports: [DocumentMapperService],
})
export class DocumentModule {}
