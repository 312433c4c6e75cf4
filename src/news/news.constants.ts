/** 스크래핑용 axios 인스턴스 주입 토큰 */
export const SCRAPER_HTTP_CLIENT = Symbol('SCRAPER_HTTP_CLIENT');

/** GoogleGenerativeAI 클라이언트 주입 토큰 */
export const GEMINI_CLIENT = Symbol('GEMINI_CLIENT');

/** 피드 설정 주입 토큰 */
export const FEED_SETTINGS = Symbol('FEED_SETTINGS');
