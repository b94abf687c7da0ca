import { Module } from '@nestjs/common';
import { StandardTokenizer } from './tokenizers/standard-tokenizer';
import { LowercaseFilter } from './filters/lowercase-filter';
import { TermAnalyzer } from './analyzers/term.analyzer';

@Module({
  providers: [StandardTokenizer, LowercaseFilter, TermAnalyzer],
  exports: [TermAnalyzer],
})
export class AnalysisModule {}
