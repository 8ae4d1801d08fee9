import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { NetworkError } from '../../common/errors';

@Injectable()
export class ArxivClient {
  private readonly logger = new Logger(ArxivClient.name);

  constructor(private readonly httpService: HttpService) {}

  /**
   * 한 번의 GET 으로 피드 본문(UTF-8 텍스트)을 가져옵니다.
   * 재시도 없이 모든 실패는 NetworkError 로 전달됩니다.
   */
  async fetchFeed(url: string): Promise<string> {
    this.logger.log(`GET ${url}`);

    try {
      const { data } = await this.httpService.axiosRef.get<string>(url, {
        responseType: 'text',
        responseEncoding: 'utf8',
      });
      return data;
    } catch (e) {
      throw this.toNetworkError(url, e);
    }
  }

  private toNetworkError(url: string, e: unknown): NetworkError {
    if (isAxiosError(e)) {
      const status = e.response?.status;
      const message =
        status !== undefined
          ? `HTTP ${status} from ${url}`
          : `${e.message} (${url})`;
      return new NetworkError(url, message, status, e);
    }

    const message = e instanceof Error ? e.message : String(e);
    return new NetworkError(url, `${message} (${url})`, undefined, e);
  }
}
