import { NewsCategory } from '../config/news-categories.config';

/**
 * 추출된 뉴스 기사
 */
export interface NewsArticle {
  /** 기사 제목 */
  headline: string;
  /** 2-3문장 요약 */
  summary: string;
  /** 핵심 요점 (2-4개) */
  key_points: string[];
}

/**
 * 카테고리별 뉴스
 *
 * 모든 카테고리 키가 항상 존재하며, 빈 배열은 "해당 카테고리 기사 없음"을 의미합니다.
 */
export type CategorizedNews = Record<NewsCategory, NewsArticle[]>;
