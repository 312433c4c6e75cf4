import { Inject, Injectable, Logger } from '@nestjs/common';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { getErrorMessage } from '../../common/utils/error-message.util';
import { Result, failure, success } from '../../common/types/result.type';
import { FeedSettings } from '../config/feed.config';
import { NEWS_CATEGORIES } from '../config/news-categories.config';
import { CategorizedNews, NewsArticle } from '../interfaces/categorized-news.interface';
import { buildExtractionSchema } from '../schemas/extraction.schema';
import { FEED_SETTINGS, GEMINI_CLIENT } from '../news.constants';

/**
 * Google Gemini AI 뉴스 추출 서비스
 *
 * 스크래핑된 홈페이지 텍스트를 Gemini에 전달하여 카테고리별 기사 JSON을 생성합니다.
 *
 * 주요 기능:
 * - 추출 지침 + 본문으로 단일 프롬프트 구성
 * - JSON mime 타입과 응답 스키마로 출력 구조 강제
 * - JSON 파싱 및 카테고리 구조 검증
 * - 모든 실패를 결과 값으로 변환 (재시도 없음)
 */
@Injectable()
export class GeminiService {
  private readonly logger = new Logger(GeminiService.name);

  constructor(
    @Inject(GEMINI_CLIENT)
    private readonly genAI: GoogleGenerativeAI,
    @Inject(FEED_SETTINGS)
    private readonly settings: FeedSettings,
  ) {}

  /**
   * 본문 텍스트에서 카테고리별 뉴스를 추출합니다
   *
   * @param websiteText - 정제 및 길이 제한이 적용된 홈페이지 텍스트
   * @returns 카테고리별 뉴스 또는 진단 메시지가 담긴 실패
   */
  async extractNews(websiteText: string): Promise<Result<CategorizedNews>> {
    const prompt = this.buildPrompt(websiteText);

    const model = this.genAI.getGenerativeModel({
      model: this.settings.geminiModel,
      generationConfig: {
        responseMimeType: 'application/json',
        responseSchema: buildExtractionSchema(NEWS_CATEGORIES),
      },
    });

    this.logger.log('Sending request to Gemini API to extract structured news...');

    let text: string;
    try {
      const result = await model.generateContent(prompt);
      text = result.response.text();
    } catch (error) {
      const detail = `Error communicating with Gemini API: ${getErrorMessage(error)}`;
      this.logger.error(detail);
      return failure('llm-transport', detail);
    }

    this.logger.debug(`Received response from Gemini: ${text.substring(0, 100)}...`);

    return this.parseNewsResponse(text);
  }

  /**
   * Gemini용 프롬프트를 생성합니다
   *
   * 프롬프트 요구사항:
   * - 스키마를 따르는 JSON 객체 하나만 반환
   * - 기사 추출 및 카테고리 분류
   * - 2-3문장 요약, 2-4개 핵심 요점
   * - 광고/메뉴 등 비기사 콘텐츠 제외
   * - 지정 지역 관점의 중요도 순 정렬
   * - 중복 기사 생략
   */
  buildPrompt(websiteText: string): string {
    const categoryList = NEWS_CATEGORIES.map((category) => `"${category}"`).join(', ');

    return `You are a news content extractor. Your response **MUST** be a single, raw JSON object (no wrappers, no prose)
that strictly adheres to the provided JSON schema.

From the following website content, please:

1. Identify and extract the main news articles.
2. Classify each article into one of the following categories: ${categoryList}.
3. For each article, provide: Headline, Brief summary (2-3 sentences), and Key points (a list of 2-4 critical takeaways).
4. Filter out advertisements, navigation menus, and all irrelevant, non-news content.
5. Order the articles in each category by their importance, scale and effect from the ${this.settings.region} perspective.
6. Skip an article if the same story has already been included.

If a category has no content, its array should be empty ([]).

Website Content:
${websiteText}`;
  }

  /**
   * Gemini 응답 텍스트를 파싱합니다
   *
   * 처리 기능:
   * - 마크다운 코드 블록 제거 (```json, ```)
   * - JSON 파싱 (실패 시 원본 텍스트 포함 진단 메시지)
   * - 모든 카테고리 키와 기사 필드 검증
   * - 카테고리 목록에 없는 키 제거
   */
  parseNewsResponse(text: string): Result<CategorizedNews> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.stripCodeFence(text));
    } catch {
      const detail = `Error: Model returned invalid JSON. Raw text: ${text}`;
      this.logger.error('Failed to parse Gemini response as JSON');
      return failure('llm-invalid-json', detail);
    }

    const news = this.toCategorizedNews(parsed);
    if (!news) {
      this.logger.warn('Gemini response does not match the news schema');
      return failure(
        'llm-schema-mismatch',
        `Error: Model returned JSON that does not match the news schema. Raw text: ${text}`,
      );
    }

    const total = NEWS_CATEGORIES.reduce((sum, category) => sum + news[category].length, 0);
    this.logger.log(`Extracted ${total} articles across ${NEWS_CATEGORIES.length} categories`);

    return success(news);
  }

  private stripCodeFence(text: string): string {
    let jsonText = text.trim();

    if (jsonText.startsWith('```json')) {
      jsonText = jsonText.replace(/^```json\s*/, '').replace(/```\s*$/, '');
    } else if (jsonText.startsWith('```')) {
      jsonText = jsonText.replace(/^```\s*/, '').replace(/```\s*$/, '');
    }

    return jsonText.trim();
  }

  private toCategorizedNews(value: unknown): CategorizedNews | null {
    if (!isRecord(value)) return null;

    const news: Partial<CategorizedNews> = {};
    for (const category of NEWS_CATEGORIES) {
      const articles = value[category];
      if (!Array.isArray(articles) || !articles.every(isNewsArticle)) {
        return null;
      }
      news[category] = articles.map((article) => ({
        headline: article.headline,
        summary: article.summary,
        key_points: [...article.key_points],
      }));
    }

    return isComplete(news) ? news : null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNewsArticle(value: unknown): value is NewsArticle {
  return (
    isRecord(value) &&
    typeof value.headline === 'string' &&
    typeof value.summary === 'string' &&
    Array.isArray(value.key_points) &&
    value.key_points.every((point) => typeof point === 'string')
  );
}

function isComplete(news: Partial<CategorizedNews>): news is CategorizedNews {
  return NEWS_CATEGORIES.every((category) => Array.isArray(news[category]));
}
