import { LogLevel } from '@nestjs/common';

// 심각도가 높은 순서
const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * LOG_LEVEL 이하(더 심각한 쪽)의 레벨 목록. 알 수 없는 값은 기본값으로 처리합니다.
 */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const normalized = level?.trim().toLowerCase();
  const index = LOG_LEVELS.findIndex((candidate) => candidate === normalized);
  const threshold = index >= 0 ? index : LOG_LEVELS.indexOf(DEFAULT_LOG_LEVEL);
  return LOG_LEVELS.slice(0, threshold + 1);
}
