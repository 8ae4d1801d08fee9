import { Injectable, Logger } from '@nestjs/common';
import { ArxivClient } from '../client/arxiv-client';
import { AtomFeedParser } from '../parser/atom-feed.parser';
import { FeedWriter } from '../writer/feed-writer';
import { FeedRunResult } from '../dto/arxiv-feed-payload.dto';
import { ArxivUtil } from '../util/arxiv.util';
import { FetchConfig } from '../../config/fetch.config';

@Injectable()
export class ArxivFeedService {
  private readonly logger = new Logger(ArxivFeedService.name);

  constructor(
    private readonly arxivClient: ArxivClient,
    private readonly parser: AtomFeedParser,
    private readonly writer: FeedWriter,
  ) {}

  /**
   * URL 생성 -> 조회 -> 파싱 -> 저장, 한 번만 실행
   * 파싱이 모두 성공한 뒤에만 파일을 씁니다.
   */
  async run(config: FetchConfig): Promise<FeedRunResult> {
    const { query, maxResults, outputPath } = config;

    //=== 1. 요청 URL 생성 ===//
    const url = ArxivUtil.buildApiUrl(query, maxResults);

    //=== 2. 피드 조회 ===//
    const xml = await this.arxivClient.fetchFeed(url);

    //=== 3. XML 파싱 ===//
    const papers = this.parser.parse(xml);
    this.logger.log(`피드 파싱 완료 — 총 ${papers.length}건`);

    //=== 4. JSON 저장 ===//
    const payload = this.writer.write(papers, outputPath, query, maxResults);

    return { count: payload.count, outputPath };
  }
}
