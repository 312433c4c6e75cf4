import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { getErrorMessage } from '../../common/utils/error-message.util';
import { Result, failure, success } from '../../common/types/result.type';
import { CategorizedNews } from '../../news/interfaces/categorized-news.interface';
import { NEWS_SNAPSHOT_MODEL, NewsSnapshot } from '../schemas/news-snapshot.schema';

/**
 * 뉴스 스냅샷 저장 서비스
 *
 * daily_news 컬렉션을 "최신 값 캐시"로 사용합니다.
 * 저장할 때마다 기존 문서를 모두 삭제한 뒤 새 문서 하나를 추가합니다.
 */
@Injectable()
export class NewsSnapshotService {
  private readonly logger = new Logger(NewsSnapshotService.name);

  constructor(
    @InjectModel(NEWS_SNAPSHOT_MODEL)
    private readonly snapshotModel: Model<NewsSnapshot>,
  ) {}

  /**
   * 기존 스냅샷을 지우고 새 스냅샷을 저장합니다
   *
   * @param news - 카테고리별 뉴스
   * @returns 저장된 스냅샷 또는 store-write 실패 (예외를 던지지 않음)
   */
  async replaceSnapshot(news: CategorizedNews): Promise<Result<NewsSnapshot>> {
    try {
      const deleted = await this.snapshotModel.deleteMany({}).exec();
      this.logger.debug(`Cleared ${deleted.deletedCount} previous snapshot(s)`);

      const snapshot: NewsSnapshot = { date: new Date(), news };
      await this.snapshotModel.create(snapshot);

      this.logger.log('News updated in MongoDB');
      return success(snapshot);
    } catch (error) {
      const detail = `Failed to insert into MongoDB: ${getErrorMessage(error)}`;
      this.logger.error(detail);
      return failure('store-write', detail);
    }
  }

  /**
   * 가장 최근 스냅샷을 조회합니다
   *
   * @returns 스냅샷 (없으면 null)
   */
  async getLatestSnapshot(): Promise<NewsSnapshot | null> {
    const doc = await this.snapshotModel.findOne().sort({ date: -1 }).exec();
    if (!doc) return null;

    return { date: doc.date, news: doc.news };
  }
}
