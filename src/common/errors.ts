export type ArxivFeedErrorKind = 'config' | 'network' | 'parse' | 'io';

/**
 * 파이프라인 단계 경계에서 던지는 에러의 공통 부모.
 * 최상위 핸들러는 kind 만 보고 종료 코드와 진단 메시지를 결정합니다.
 */
export abstract class ArxivFeedError extends Error {
  abstract readonly kind: ArxivFeedErrorKind;

  protected constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

export class ConfigError extends ArxivFeedError {
  readonly kind = 'config';

  constructor(
    public readonly key: string,
    message: string,
  ) {
    super(`${key}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class NetworkError extends ArxivFeedError {
  readonly kind = 'network';

  constructor(
    public readonly url: string,
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'NetworkError';
  }
}

export class ParseError extends ArxivFeedError {
  readonly kind = 'parse';

  constructor(
    message: string,
    public readonly line?: number,
    cause?: unknown,
  ) {
    super(line === undefined ? message : `${message} (line ${line})`, cause);
    this.name = 'ParseError';
  }
}

export class IOError extends ArxivFeedError {
  readonly kind = 'io';

  constructor(
    public readonly path: string,
    message: string,
    cause?: unknown,
  ) {
    super(`${message}: ${path}`, cause);
    this.name = 'IOError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
