/**
 * 뉴스 카테고리
 *
 * 순서는 응답 스키마와 프롬프트에 그대로 반영됩니다.
 */
export const NEWS_CATEGORIES = [
  'World',
  'Business',
  'Technology',
  'Entertainment',
  'Sports',
  'Science',
  'Health',
] as const;

export type NewsCategory = (typeof NEWS_CATEGORIES)[number];
