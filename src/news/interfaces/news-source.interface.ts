/**
 * 뉴스 출처 인터페이스
 */
export interface NewsSource {
  /** 출처 ID (고유 식별자) */
  id: string;

  /** 언론사 이름 */
  name: string;

  /** 스크래핑할 홈페이지 URL */
  website: string;

  /** 활성화 여부 */
  enabled: boolean;
}

/**
 * 뉴스 출처 설정 타입
 */
export type NewsSourceConfig = Record<string, NewsSource>;
