import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

/**
 * HTTP 서버 부트스트랩
 *
 * - POST /news/feed/trigger: 피드 실행
 * - GET /news/latest: 최신 스냅샷 조회
 *
 * MongoDB 연결 확인에 실패하면 프로세스를 종료합니다 (exit 1).
 */
async function bootstrap() {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.create(AppModule);
    app.enableShutdownHooks();

    const port = parseInt(process.env.PORT || '3000', 10);
    await app.listen(port);
    logger.log(`News digest server listening on port ${port}`);
  } catch (error) {
    logger.error('Failed to start server:', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  }
}

void bootstrap();
