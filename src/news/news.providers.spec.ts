import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_FEED_SETTINGS, SCRAPER_USER_AGENT } from './config/feed.config';
import { createGeminiClient, createScraperHttpClient } from './news.providers';

const KEY_VARIABLES = ['GEMINI_API_KEY', 'GOOGLE_API_KEY'];

describe('news providers', () => {
  describe('createScraperHttpClient', () => {
    it('applies the request timeout and browser user agent', () => {
      const client = createScraperHttpClient(DEFAULT_FEED_SETTINGS);

      expect(client.defaults.timeout).toBe(15000);
      expect(client.defaults.headers['User-Agent']).toBe(SCRAPER_USER_AGENT);
    });

    it('follows the configured timeout', () => {
      const client = createScraperHttpClient({ ...DEFAULT_FEED_SETTINGS, requestTimeoutMs: 5000 });

      expect(client.defaults.timeout).toBe(5000);
    });
  });

  describe('createGeminiClient', () => {
    const savedEnv: Record<string, string | undefined> = {};
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
      for (const name of KEY_VARIABLES) {
        savedEnv[name] = process.env[name];
        delete process.env[name];
      }
      warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
      for (const name of KEY_VARIABLES) {
        const value = savedEnv[name];
        if (value === undefined) {
          delete process.env[name];
        } else {
          process.env[name] = value;
        }
      }
      jest.restoreAllMocks();
    });

    it('uses GEMINI_API_KEY when it is set', () => {
      const client = createGeminiClient(new ConfigService({ GEMINI_API_KEY: 'test-secret' }));

      expect(client.apiKey).toBe('test-secret');
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('warns and falls back to the default key when GEMINI_API_KEY is missing', () => {
      const client = createGeminiClient(new ConfigService({ GOOGLE_API_KEY: 'test-default' }));

      expect(client.apiKey).toBe('test-default');
      expect(warnSpy).toHaveBeenCalledWith(
        'GEMINI_API_KEY not found. Using default client initialization.',
      );
    });

    it('still builds a client when no key is configured at all', () => {
      const client = createGeminiClient(new ConfigService({}));

      expect(client.apiKey).toBe('');
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });
  });
});
