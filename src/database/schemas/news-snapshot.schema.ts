import { Schema } from 'mongoose';
import { CategorizedNews } from '../../news/interfaces/categorized-news.interface';

/** 스냅샷 모델 이름 */
export const NEWS_SNAPSHOT_MODEL = 'NewsSnapshot';

/** 스냅샷 컬렉션 이름 */
export const NEWS_SNAPSHOT_COLLECTION = 'daily_news';

/**
 * 최신 뉴스 스냅샷 문서
 *
 * 컬렉션에는 성공한 실행의 결과 하나만 남습니다 (이력 아님).
 */
export interface NewsSnapshot {
  /** 저장 시각 */
  date: Date;
  /** 카테고리별 뉴스 */
  news: CategorizedNews;
}

export const NewsSnapshotSchema = new Schema<NewsSnapshot>(
  {
    date: { type: Date, required: true },
    news: { type: Schema.Types.Mixed, required: true },
  },
  { collection: NEWS_SNAPSHOT_COLLECTION, versionKey: false, minimize: false },
);
