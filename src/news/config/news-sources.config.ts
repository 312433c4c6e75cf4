import { NewsSourceConfig } from '../interfaces/news-source.interface';

/**
 * 뉴스 출처 설정
 *
 * 스크래핑 순서는 선언 순서를 따릅니다 (Times of India → Sputnik India → Euronews).
 */
export const NEWS_SOURCES: NewsSourceConfig = {
  timesofindia: {
    id: 'timesofindia',
    name: 'The Times of India',
    website: 'https://timesofindia.indiatimes.com',
    enabled: true,
  },

  sputnikindia: {
    id: 'sputnikindia',
    name: 'Sputnik India',
    website: 'https://sputniknews.in',
    enabled: true,
  },

  euronews: {
    id: 'euronews',
    name: 'Euronews',
    website: 'https://www.euronews.com/',
    enabled: true,
  },
};

/**
 * 활성화된 뉴스 출처 목록 가져오기
 */
export function getEnabledNewsSources() {
  return Object.values(NEWS_SOURCES).filter((source) => source.enabled);
}

/**
 * 활성화된 출처의 홈페이지 URL 목록
 */
export function getEnabledSourceUrls(): string[] {
  return getEnabledNewsSources().map((source) => source.website);
}
