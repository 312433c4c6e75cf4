import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { HtmlCleaner } from '../../common/utils/html-cleaner.util';
import { getErrorMessage } from '../../common/utils/error-message.util';
import { Result, failure, success } from '../../common/types/result.type';
import { PageContent } from '../interfaces/page-content.interface';
import { SCRAPER_HTTP_CLIENT } from '../news.constants';

/** 스크래핑 실패 시 진단 메시지 접두사 */
export const FETCH_FAILURE_PREFIX = 'Failed to retrieve website content:';

/**
 * 뉴스 홈페이지 스크래핑 서비스
 *
 * 홈페이지 HTML을 가져와 기사와 무관한 요소를 제거한 본문 텍스트를 반환합니다.
 * 요청 실패는 예외 대신 fetch 실패 결과로 전달합니다 (재시도 없음).
 */
@Injectable()
export class PageFetcherService {
  private readonly logger = new Logger(PageFetcherService.name);

  constructor(
    @Inject(SCRAPER_HTTP_CLIENT)
    private readonly http: AxiosInstance,
  ) {}

  /**
   * URL에서 페이지를 가져와 정제합니다
   *
   * @param url - 홈페이지 URL
   * @returns 정제된 페이지 또는 fetch 실패
   */
  async fetchPage(url: string): Promise<Result<PageContent>> {
    this.logger.log(`Fetching page: ${url}`);

    let html: string;
    try {
      const response = await this.http.get<string>(url, { responseType: 'text' });
      html = response.data;
    } catch (error) {
      const detail = `${FETCH_FAILURE_PREFIX} ${getErrorMessage(error)}`;
      this.logger.warn(`Failed to fetch ${url}: ${getErrorMessage(error)}`);
      return failure('fetch', detail);
    }

    const page = HtmlCleaner.clean(html);

    if (!page.hasBody) {
      this.logger.warn(`No body content found for: ${url}`);
    }

    this.logger.debug(`Extracted "${page.title}" - ${page.text.length} chars from ${url}`);

    return success({ url, ...page });
  }
}
