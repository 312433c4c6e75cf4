import {
  Controller,
  Get,
  HttpException,
  HttpStatus,
  Logger,
  NotFoundException,
  Post,
} from '@nestjs/common';
import { getErrorMessage } from '../common/utils/error-message.util';
import { NewsSnapshotService } from '../database/services/news-snapshot.service';
import { NewsSnapshot } from '../database/schemas/news-snapshot.schema';
import { FeedRunnerService } from './services/feed-runner.service';

/**
 * 피드 실행 응답
 */
export interface FeedTriggerResponse {
  state: string;
  ok: boolean;
  stored: boolean;
  mirrored: boolean;
  error?: string;
}

/**
 * 뉴스 컨트롤러
 *
 * 피드 수동 실행 및 최신 스냅샷 조회 엔드포인트 제공
 */
@Controller('news')
export class NewsController {
  private readonly logger = new Logger(NewsController.name);

  constructor(
    private readonly feedRunner: FeedRunnerService,
    private readonly snapshotService: NewsSnapshotService,
  ) {}

  /**
   * 피드 수동 트리거
   * 스크래핑 → Gemini 추출 → MongoDB/정적 JSON 저장
   */
  @Post('feed/trigger')
  async triggerFeed(): Promise<FeedTriggerResponse> {
    this.logger.log('Manual trigger: news feed');
    const report = await this.feedRunner.run();

    return {
      state: report.state,
      ok: report.extraction.ok,
      stored: report.stored,
      mirrored: report.mirrored,
      ...(report.extraction.ok ? {} : { error: report.extraction.detail }),
    };
  }

  /**
   * 최신 뉴스 스냅샷 조회
   */
  @Get('latest')
  async getLatest(): Promise<NewsSnapshot> {
    let snapshot: NewsSnapshot | null;
    try {
      snapshot = await this.snapshotService.getLatestSnapshot();
    } catch (error) {
      this.logger.error('Failed to load latest snapshot:', getErrorMessage(error));
      throw new HttpException(
        `Failed to load latest snapshot: ${getErrorMessage(error)}`,
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }

    if (!snapshot) {
      throw new NotFoundException('No news snapshot stored yet');
    }
    return snapshot;
  }
}
