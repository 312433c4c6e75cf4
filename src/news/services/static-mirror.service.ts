import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs-extra';
import * as path from 'path';
import { getErrorMessage } from '../../common/utils/error-message.util';
import { Result, failure, success } from '../../common/types/result.type';
import { FeedSettings } from '../config/feed.config';
import { CategorizedNews } from '../interfaces/categorized-news.interface';
import { FEED_SETTINGS } from '../news.constants';

/**
 * 정적 JSON 파일 저장 서비스
 *
 * 정적 호스팅 페이지(docs/)가 읽는 news.json을 갱신합니다.
 * UTF-8, 2칸 들여쓰기, 비ASCII 문자는 이스케이프하지 않습니다.
 */
@Injectable()
export class StaticMirrorService {
  private readonly logger = new Logger(StaticMirrorService.name);

  constructor(
    @Inject(FEED_SETTINGS)
    private readonly settings: FeedSettings,
  ) {}

  get enabled(): boolean {
    return this.settings.staticMirrorEnabled;
  }

  /**
   * 카테고리별 뉴스를 JSON 파일로 저장합니다
   *
   * @param news - 카테고리별 뉴스
   * @returns 저장된 절대 경로 또는 mirror-write 실패
   */
  async write(news: CategorizedNews): Promise<Result<string>> {
    const filePath = path.resolve(this.settings.staticMirrorPath);

    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeJson(filePath, news, { spaces: 2, encoding: 'utf8' });

      this.logger.log(`Saved news JSON to: ${filePath}`);
      return success(filePath);
    } catch (error) {
      const detail = `Failed to write news JSON to ${filePath}: ${getErrorMessage(error)}`;
      this.logger.error(detail);
      return failure('mirror-write', detail);
    }
  }
}
