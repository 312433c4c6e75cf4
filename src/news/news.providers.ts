import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { FeedSettings, SCRAPER_USER_AGENT } from './config/feed.config';

/**
 * 스크래핑용 axios 인스턴스를 생성합니다
 *
 * 모든 요청에 타임아웃과 브라우저 User-Agent가 적용됩니다.
 */
export function createScraperHttpClient(settings: FeedSettings): AxiosInstance {
  return axios.create({
    timeout: settings.requestTimeoutMs,
    headers: { 'User-Agent': SCRAPER_USER_AGENT },
  });
}

/**
 * Gemini 클라이언트를 생성합니다
 */
export function createGeminiClient(configService: ConfigService): GoogleGenerativeAI {
  const apiKey = configService.get<string>('GEMINI_API_KEY');
  if (apiKey) {
    return new GoogleGenerativeAI(apiKey);
  }

  // 키가 없으면 실행 환경의 기본 키로 초기화 (호출 시 실패할 수 있음)
  new Logger('GeminiClient').warn('GEMINI_API_KEY not found. Using default client initialization.');
  return new GoogleGenerativeAI(configService.get<string>('GOOGLE_API_KEY') || '');
}
