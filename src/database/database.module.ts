import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { NEWS_SNAPSHOT_MODEL, NewsSnapshotSchema } from './schemas/news-snapshot.schema';
import { NewsSnapshotService } from './services/news-snapshot.service';
import { StoreHealthService } from './services/store-health.service';

/**
 * MongoDB 데이터베이스 모듈
 *
 * - 연결 문자열: MONGODB_URI
 * - 데이터베이스: MONGODB_DB_NAME (기본 news_db)
 * - 컬렉션: daily_news (최신 스냅샷 하나만 유지)
 * - 연결 재시도 없음: 시작 시 연결 실패는 부트스트랩 실패로 처리
 */
@Module({
  imports: [
    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        uri: configService.get<string>('MONGODB_URI') || 'mongodb://localhost:27017',
        dbName: configService.get<string>('MONGODB_DB_NAME') || 'news_db',
        retryAttempts: 0,
        serverSelectionTimeoutMS: 10000,
      }),
      inject: [ConfigService],
    }),
    MongooseModule.forFeature([{ name: NEWS_SNAPSHOT_MODEL, schema: NewsSnapshotSchema }]),
  ],
  providers: [NewsSnapshotService, StoreHealthService],
  exports: [NewsSnapshotService],
})
export class DatabaseModule {}
