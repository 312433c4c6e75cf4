import { SchemaType } from '@google/generative-ai';
import { ARTICLE_SCHEMA, buildExtractionSchema } from './extraction.schema';

describe('buildExtractionSchema', () => {
  it('requires every default category in fixed order', () => {
    const schema = buildExtractionSchema();

    expect(schema.type).toBe(SchemaType.OBJECT);
    expect(schema).toMatchObject({
      required: ['World', 'Business', 'Technology', 'Entertainment', 'Sports', 'Science', 'Health'],
    });
  });

  it('describes each category as an array of articles', () => {
    const schema = buildExtractionSchema(['World']);

    expect(schema).toEqual({
      type: SchemaType.OBJECT,
      properties: {
        World: {
          type: SchemaType.ARRAY,
          description: 'List of articles belonging to the World category.',
          items: ARTICLE_SCHEMA,
        },
      },
      required: ['World'],
    });
  });

  it('keeps article properties in headline, summary, key_points order', () => {
    expect(ARTICLE_SCHEMA).toMatchObject({
      required: ['headline', 'summary', 'key_points'],
    });
    const properties = 'properties' in ARTICLE_SCHEMA ? ARTICLE_SCHEMA.properties : undefined;
    expect(Object.keys(properties ?? {})).toEqual([
      'headline',
      'summary',
      'key_points',
    ]);
  });

  it('is deterministic', () => {
    expect(buildExtractionSchema()).toEqual(buildExtractionSchema());
  });
});
