import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AnalysisModule } from './analysis/analysis.module';
import { CliModule } from './cli/cli.module';
import { validateEnvironment } from './config/env.validation';
import indexerConfig from './config/indexer.config';
import { DocumentModule } from './document/document.module';
import { IndexModule } from './index/index.module';
import { IndexingModule } from './indexing/indexing.module';
import { SearchModule } from './search/search.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [indexerConfig],
      validate: validateEnvironment,
    }),
    AnalysisModule,
    DocumentModule,
    IndexModule,
    IndexingModule,
    SearchModule,
    CliModule,
  ],
})
export class AppModule {}
