import { Schema, SchemaType } from '@google/generative-ai';
import { NEWS_CATEGORIES } from '../config/news-categories.config';

/**
 * 기사 항목 스키마
 */
export const ARTICLE_SCHEMA: Schema = {
  type: SchemaType.OBJECT,
  properties: {
    headline: {
      type: SchemaType.STRING,
      description: 'The main headline of the news article.',
    },
    summary: {
      type: SchemaType.STRING,
      description: 'A brief summary of the article (2-3 sentences).',
    },
    key_points: {
      type: SchemaType.ARRAY,
      description: 'A list of the 2-4 most critical takeaways.',
      items: { type: SchemaType.STRING },
    },
  },
  required: ['headline', 'summary', 'key_points'],
};

/**
 * Gemini 응답 스키마를 생성합니다
 *
 * @param categories - 카테고리 목록 (순서 유지)
 * @returns 카테고리마다 기사 배열을 필수 속성으로 가지는 객체 스키마
 */
export function buildExtractionSchema(
  categories: readonly string[] = NEWS_CATEGORIES,
): Schema {
  const properties: Record<string, Schema> = {};

  for (const category of categories) {
    properties[category] = {
      type: SchemaType.ARRAY,
      description: `List of articles belonging to the ${category} category.`,
      items: ARTICLE_SCHEMA,
    };
  }

  return {
    type: SchemaType.OBJECT,
    properties,
    required: [...categories],
  };
}
