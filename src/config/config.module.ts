import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { HttpModule } from '@nestjs/axios';
import { ArxivClient } from '../arxiv/client/arxiv-client';

export const REQUEST_TIMEOUT_MS = 30_000;

@Module({
  imports: [
    NestConfigModule,
    HttpModule.register({
      timeout: REQUEST_TIMEOUT_MS, // 고정 30초
      headers: {
        Accept: 'application/atom+xml',
      },
    }),
  ],
  providers: [ArxivClient],
  exports: [HttpModule, ArxivClient],
})
export class ConfigModule {}
