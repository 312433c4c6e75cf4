import { ConfigService } from '@nestjs/config';

/**
 * 피드 실행 설정
 */
export interface FeedSettings {
  /** Gemini 모델 이름 */
  geminiModel: string;
  /** LLM에 전달할 최대 문자 수 */
  maxContentLength: number;
  /** 페이지 요청 타임아웃 (밀리초) */
  requestTimeoutMs: number;
  /** 기사 우선순위 기준 지역 */
  region: string;
  /** 정적 JSON 파일 저장 여부 */
  staticMirrorEnabled: boolean;
  /** 정적 JSON 파일 경로 */
  staticMirrorPath: string;
}

export const DEFAULT_FEED_SETTINGS: FeedSettings = {
  geminiModel: 'gemini-2.5-flash',
  maxContentLength: 55000,
  requestTimeoutMs: 15000,
  region: 'Indian',
  staticMirrorEnabled: true,
  staticMirrorPath: 'docs/news.json',
};

/** 출처 사이의 구분선 */
export const SOURCE_SEPARATOR = '\n\n--- NEXT WEBSITE ---\n\n';

/** 추출 성공/실패 상태 문구 */
export const EXTRACTION_SUCCESS_STATE = '--- SUCCESSFULLY EXTRACTED NEWS (JSON) ---';
export const EXTRACTION_FAILURE_STATE = '--- EXTRACTION FAILED (SEE ERROR) ---';

/** 스크래핑 요청 User-Agent */
export const SCRAPER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/117.0.0.0 Safari/537.36';

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

/**
 * 환경 변수에서 피드 설정을 읽습니다
 *
 * @param configService - Nest 설정 서비스
 * @returns 기본값이 채워진 설정
 */
export function resolveFeedSettings(configService: ConfigService): FeedSettings {
  const get = (key: string) => configService.get<string>(key);

  return {
    geminiModel: get('GEMINI_MODEL') || DEFAULT_FEED_SETTINGS.geminiModel,
    maxContentLength: parsePositiveInt(
      get('FEED_MAX_CONTENT_LENGTH'),
      DEFAULT_FEED_SETTINGS.maxContentLength,
    ),
    requestTimeoutMs: parsePositiveInt(
      get('FEED_REQUEST_TIMEOUT_MS'),
      DEFAULT_FEED_SETTINGS.requestTimeoutMs,
    ),
    region: get('FEED_REGION') || DEFAULT_FEED_SETTINGS.region,
    staticMirrorEnabled: parseBoolean(
      get('FEED_STATIC_MIRROR_ENABLED'),
      DEFAULT_FEED_SETTINGS.staticMirrorEnabled,
    ),
    staticMirrorPath: get('FEED_STATIC_MIRROR_PATH') || DEFAULT_FEED_SETTINGS.staticMirrorPath,
  };
}
