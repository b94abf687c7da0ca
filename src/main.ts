#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { IndexerCommand } from './cli/indexer.command';
import { resolveLogLevels, StderrLogger } from './common/logger/stderr.logger';
import { describeError } from './common/utils/error.utils';

async function bootstrap(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: new StderrLogger('CorpusIndexer', { logLevels: resolveLogLevels(process.env.LOG_LEVEL) }),
    abortOnError: false,
  });

  try {
    return await app.get(IndexerCommand).run(process.argv.slice(2), process.stdin, process.stdout);
  } finally {
    await app.close();
  }
}

bootstrap()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    Logger.error(describeError(error), 'Bootstrap');
    process.exitCode = 1;
  });
