import { ArxivPaperDto } from './arxiv-paper.dto';

export interface ArxivFeedPayloadDto {
  generated_at_utc: string;
  query: string;
  max_results: number;
  count: number;
  papers: ArxivPaperDto[];
}

export interface FeedRunResult {
  count: number;
  outputPath: string;
}
