import { ConfigService } from '@nestjs/config';
import { ConfigError } from '../common/errors';

export const DEFAULT_QUERY = '(all:"large language model" OR all:"generative ai")';
export const DEFAULT_MAX_RESULTS = 12;
export const DEFAULT_OUTPUT = 'data/arxiv.json';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * 한 번의 실행 동안 바뀌지 않는 수집 설정
 */
export class FetchConfig {
  constructor(
    readonly query: string,
    readonly maxResults: number,
    readonly outputPath: string,
  ) {}
}

/**
 * 환경 변수에서 FetchConfig 생성. 값이 없을 때만 기본값을 사용합니다.
 */
export function loadFetchConfig(configService: ConfigService): FetchConfig {
  const query = configService.get<string>('ARXIV_QUERY') ?? DEFAULT_QUERY;
  const rawMaxResults = configService.get<string>('ARXIV_MAX_RESULTS');
  const outputPath = configService.get<string>('ARXIV_OUTPUT') ?? DEFAULT_OUTPUT;

  return new FetchConfig(query, parseMaxResults(rawMaxResults), outputPath);
}

export function parseMaxResults(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_MAX_RESULTS;
  }
  if (!INTEGER_PATTERN.test(raw)) {
    throw new ConfigError(
      'ARXIV_MAX_RESULTS',
      `expected an integer, got "${raw}"`,
    );
  }
  const value = Number.parseInt(raw.trim(), 10);
  // 안전한 정수 범위(±2^53-1)만 허용
  if (!Number.isSafeInteger(value)) {
    throw new ConfigError(
      'ARXIV_MAX_RESULTS',
      `expected a safe integer, got "${raw}"`,
    );
  }
  return value;
}
