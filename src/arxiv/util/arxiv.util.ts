export class ArxivUtil {
  static readonly API_URL = 'https://export.arxiv.org/api/query';
  static readonly SORT_BY = 'lastUpdatedDate';
  static readonly SORT_ORDER = 'descending';

  /**
   * arXiv query API 요청 URL 생성 유틸
   * 검증 없이 그대로 인코딩합니다. (0 이하의 limit 도 API 로 전달)
   */
  static buildApiUrl(query: string, maxResults: number): string {
    const params = new URLSearchParams({
      search_query: query,
      start: '0',
      max_results: String(maxResults),
      sortBy: this.SORT_BY,
      sortOrder: this.SORT_ORDER,
    });
    return `${this.API_URL}?${params.toString()}`;
  }

  /**
   * 연속된 공백을 한 칸으로 줄이고 양끝 공백 제거
   */
  static normalizeWhitespace(value: string): string {
    return value.split(/\s+/).filter((part) => part !== '').join(' ');
  }

  /**
   * PDF 링크가 없을 때 id(/abs/...) 로부터 PDF URL 유도
   */
  static derivePdfUrl(id: string): string {
    if (!id) return '';
    return `${id.split('/abs/').join('/pdf/')}.pdf`;
  }

  /**
   * UTC 초 단위 타임스탬프 (예: 2024-01-15T10:30:45Z)
   */
  static formatUtcTimestamp(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
  }
}
