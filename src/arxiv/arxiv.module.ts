import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { AtomFeedParser } from './parser/atom-feed.parser';
import { FeedWriter } from './writer/feed-writer';
import { ArxivFeedService } from './feed/arxiv-feed.service';

@Module({
  imports: [ConfigModule],
  providers: [AtomFeedParser, FeedWriter, ArxivFeedService],
  exports: [ArxivFeedService],
})
export class ArxivModule {}
