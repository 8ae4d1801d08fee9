/**
 * 출력 JSON 의 papers 항목. 키 이름은 게시되는 파일 포맷 그대로입니다.
 */
export interface ArxivPaperDto {
  id: string;
  title: string;
  authors: string[];
  summary: string;
  published: string;
  updated: string;
  pdf_url: string;
}
