import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { ArxivPaperDto } from '../dto/arxiv-paper.dto';
import { ArxivFeedPayloadDto } from '../dto/arxiv-feed-payload.dto';
import { ArxivUtil } from '../util/arxiv.util';
import { IOError } from '../../common/errors';

@Injectable()
export class FeedWriter {
  private readonly logger = new Logger(FeedWriter.name);

  /**
   * 실행 메타데이터로 감싼 payload 를 JSON 파일로 저장 (기존 파일 덮어쓰기)
   */
  write(
    papers: ArxivPaperDto[],
    outputPath: string,
    query: string,
    maxResults: number,
    now: Date = new Date(),
  ): ArxivFeedPayloadDto {
    const payload = this.buildPayload(papers, query, maxResults, now);

    try {
      // 상위 디렉토리 생성 (이미 있으면 그대로)
      fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
      fs.writeFileSync(outputPath, `${JSON.stringify(payload, null, 2)}\n`, {
        encoding: 'utf-8',
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new IOError(outputPath, `Failed to write feed (${reason})`, error);
    }

    this.logger.log(`JSON 파일 저장 완료: ${outputPath} (총 ${payload.count}건)`);
    return payload;
  }

  buildPayload(
    papers: ArxivPaperDto[],
    query: string,
    maxResults: number,
    now: Date,
  ): ArxivFeedPayloadDto {
    return {
      generated_at_utc: ArxivUtil.formatUtcTimestamp(now),
      query,
      max_results: maxResults,
      count: papers.length,
      papers,
    };
  }
}
