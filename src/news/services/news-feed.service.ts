import { Inject, Injectable, Logger } from '@nestjs/common';
import { getErrorMessage } from '../../common/utils/error-message.util';
import { Result, failure } from '../../common/types/result.type';
import {
  EXTRACTION_FAILURE_STATE,
  EXTRACTION_SUCCESS_STATE,
  FeedSettings,
  SOURCE_SEPARATOR,
} from '../config/feed.config';
import { getEnabledSourceUrls } from '../config/news-sources.config';
import { CategorizedNews } from '../interfaces/categorized-news.interface';
import { PageContent } from '../interfaces/page-content.interface';
import { FEED_SETTINGS } from '../news.constants';
import { GeminiService } from './gemini.service';
import { PageFetcherService } from './page-fetcher.service';

/**
 * 뉴스 피드 서비스
 *
 * 설정된 홈페이지를 순서대로 스크래핑하고, 본문을 합쳐 길이를 제한한 뒤
 * Gemini로 카테고리별 뉴스를 추출합니다.
 *
 * 처리 흐름:
 * 1. 모든 출처를 순차적으로 스크래핑 (동시 요청 없음)
 * 2. 실패한 출처가 있으면 LLM 호출 없이 해당 실패 반환
 * 3. 구분선으로 본문 연결 후 최대 길이로 자르기
 * 4. Gemini 추출 결과 반환
 */
@Injectable()
export class NewsFeedService {
  private readonly logger = new Logger(NewsFeedService.name);

  constructor(
    private readonly pageFetcher: PageFetcherService,
    private readonly geminiService: GeminiService,
    @Inject(FEED_SETTINGS)
    private readonly settings: FeedSettings,
  ) {}

  /**
   * 피드를 한 번 실행합니다
   *
   * @param urls - 스크래핑할 URL 목록 (기본: 활성화된 뉴스 출처)
   */
  async feed(urls: string[] = getEnabledSourceUrls()): Promise<Result<CategorizedNews>> {
    if (urls.length === 0) {
      this.logger.warn('No news sources configured');
      return failure('orchestration', 'No news sources configured');
    }

    try {
      const pages: PageContent[] = [];
      const fetched: Result<PageContent>[] = [];
      for (const url of urls) {
        fetched.push(await this.pageFetcher.fetchPage(url));
      }

      for (const result of fetched) {
        if (!result.ok) {
          this.logger.error(result.detail);
          return result;
        }
        pages.push(result.value);
      }

      const content = this.combine(pages);
      const news = await this.geminiService.extractNews(content);

      if (news.ok) {
        this.logger.log(EXTRACTION_SUCCESS_STATE);
      } else {
        this.logger.error(EXTRACTION_FAILURE_STATE);
        this.logger.error(`Error details: ${news.detail}`);
      }

      return news;
    } catch (error) {
      const detail = `An unexpected error occurred during execution: ${getErrorMessage(error)}`;
      this.logger.error(detail);
      return failure('orchestration', detail);
    }
  }

  /**
   * 본문들을 구분선으로 연결하고 최대 길이로 자릅니다
   *
   * 자르기는 연결 후에 한 번만 적용됩니다 (출처별로 자르지 않음).
   * 길이는 코드 포인트 단위로 셉니다 (서로게이트 쌍을 나누지 않음).
   */
  combine(pages: PageContent[]): string {
    const combined = pages.map((page) => page.text).join(SOURCE_SEPARATOR);
    const limit = this.settings.maxContentLength;
    const characters = Array.from(combined);

    if (characters.length > limit) {
      this.logger.warn(`NOTE: Truncating scraped content to ${limit} characters for API call.`);
      return characters.slice(0, limit).join('');
    }

    return combined;
  }
}
