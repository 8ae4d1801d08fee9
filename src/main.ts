#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { ArxivFeedService } from './arxiv/feed/arxiv-feed.service';
import { loadFetchConfig } from './config/fetch.config';
import { resolveLogLevels } from './config/log-levels';
import { describeError } from './common/errors';

const FAILURE_PREFIX = 'Failed to fetch arXiv data';

/**
 * 파이프라인을 한 번 실행하고 종료 코드를 돌려줍니다.
 * 모든 에러는 여기서 한 줄짜리 진단 메시지로 바뀝니다.
 */
export async function runFetch(app: INestApplicationContext): Promise<number> {
  try {
    const config = loadFetchConfig(app.get(ConfigService));
    const result = await app.get(ArxivFeedService).run(config);
    process.stdout.write(`Saved ${result.count} papers to ${result.outputPath}\n`);
    return 0;
  } catch (error) {
    process.stderr.write(`${FAILURE_PREFIX}: ${describeError(error)}\n`);
    return 1;
  }
}

export async function bootstrap(): Promise<number> {
  let app: INestApplicationContext;
  try {
    // abortOnError 가 켜져 있으면 초기화 오류 시 process.abort() 로 종료됨
    app = await NestFactory.createApplicationContext(AppModule, {
      logger: resolveLogLevels(process.env.LOG_LEVEL),
      abortOnError: false,
    });
  } catch (error) {
    process.stderr.write(`${FAILURE_PREFIX}: ${describeError(error)}\n`);
    return 1;
  }

  try {
    return await runFetch(app);
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  bootstrap()
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      process.stderr.write(`${FAILURE_PREFIX}: ${describeError(error)}\n`);
      process.exitCode = 1;
    });
}
