import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseModule } from '../database/database.module';
import { resolveFeedSettings } from './config/feed.config';
import { NewsController } from './news.controller';
import { createGeminiClient, createScraperHttpClient } from './news.providers';
import { FEED_SETTINGS, GEMINI_CLIENT, SCRAPER_HTTP_CLIENT } from './news.constants';
import { FeedRunnerService } from './services/feed-runner.service';
import { GeminiService } from './services/gemini.service';
import { NewsFeedService } from './services/news-feed.service';
import { PageFetcherService } from './services/page-fetcher.service';
import { StaticMirrorService } from './services/static-mirror.service';

@Module({
  imports: [DatabaseModule],
  controllers: [NewsController],
  providers: [
    {
      provide: FEED_SETTINGS,
      useFactory: (configService: ConfigService) => resolveFeedSettings(configService),
      inject: [ConfigService],
    },
    {
      provide: SCRAPER_HTTP_CLIENT,
      useFactory: createScraperHttpClient,
      inject: [FEED_SETTINGS],
    },
    {
      provide: GEMINI_CLIENT,
      useFactory: createGeminiClient,
      inject: [ConfigService],
    },
    PageFetcherService,
    GeminiService,
    NewsFeedService,
    StaticMirrorService,
    FeedRunnerService,
  ],
  exports: [FeedRunnerService, NewsFeedService],
})
export class NewsModule {}
