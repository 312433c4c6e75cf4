import { Injectable, Logger } from '@nestjs/common';
import { Result, failure } from '../../common/types/result.type';
import { NewsSnapshotService } from '../../database/services/news-snapshot.service';
import { EXTRACTION_FAILURE_STATE, EXTRACTION_SUCCESS_STATE } from '../config/feed.config';
import { CategorizedNews } from '../interfaces/categorized-news.interface';
import { NewsFeedService } from './news-feed.service';
import { StaticMirrorService } from './static-mirror.service';

/**
 * 피드 실행 결과
 */
export interface FeedRunReport {
  /** 추출 성공/실패 상태 문구 */
  state: string;
  /** 추출 결과 */
  extraction: Result<CategorizedNews>;
  /** MongoDB 저장 여부 */
  stored: boolean;
  /** 정적 JSON 저장 여부 */
  mirrored: boolean;
}

/**
 * 피드 실행 서비스
 *
 * 스크래핑 → 추출 → 저장 전체 작업을 한 번 실행합니다.
 * 외부 스케줄러(cron 등)가 스크립트나 HTTP 트리거로 호출합니다.
 */
@Injectable()
export class FeedRunnerService {
  private readonly logger = new Logger(FeedRunnerService.name);
  private isProcessing = false;

  constructor(
    private readonly newsFeed: NewsFeedService,
    private readonly snapshotService: NewsSnapshotService,
    private readonly staticMirror: StaticMirrorService,
  ) {}

  /**
   * 작업을 실행합니다 (예외를 던지지 않음)
   *
   * - 추출 성공: MongoDB 스냅샷 교체 + 정적 JSON 저장 (서로 독립)
   * - 추출 실패: 저장 생략, 진단 메시지 로그
   * - 이미 실행 중이면 건너뜀 (스냅샷 교체가 겹치지 않도록)
   */
  async run(): Promise<FeedRunReport> {
    if (this.isProcessing) {
      this.logger.warn('Feed run already in progress, skipping');
      return {
        state: EXTRACTION_FAILURE_STATE,
        extraction: failure('orchestration', 'Feed run already in progress'),
        stored: false,
        mirrored: false,
      };
    }

    this.isProcessing = true;
    try {
      return await this.execute();
    } finally {
      this.isProcessing = false;
    }
  }

  private async execute(): Promise<FeedRunReport> {
    this.logger.log('=== Starting news feed run ===');

    const extraction = await this.newsFeed.feed();

    if (!extraction.ok) {
      this.logger.error('Failed to extract news - no data to upload to MongoDB');
      this.logger.error(`State: ${EXTRACTION_FAILURE_STATE}`);
      this.logger.error(`Error details: ${extraction.detail}`);
      return { state: EXTRACTION_FAILURE_STATE, extraction, stored: false, mirrored: false };
    }

    const stored = await this.snapshotService.replaceSnapshot(extraction.value);

    let mirrored = false;
    if (this.staticMirror.enabled) {
      const written = await this.staticMirror.write(extraction.value);
      mirrored = written.ok;
    }

    this.logger.log(`=== News feed run completed: stored=${stored.ok}, mirrored=${mirrored} ===`);

    return { state: EXTRACTION_SUCCESS_STATE, extraction, stored: stored.ok, mirrored };
  }
}
