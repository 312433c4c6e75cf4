/**
 * 스크래핑된 페이지 내용
 */
export interface PageContent {
  /** 요청 URL */
  url: string;
  /** 페이지 제목 */
  title: string;
  /** 정제된 본문 텍스트 */
  text: string;
  /** <body> 존재 여부 */
  hasBody: boolean;
}
