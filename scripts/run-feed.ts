#!/usr/bin/env ts-node

/**
 * 뉴스 피드 1회 실행 스크립트
 *
 * 사용법:
 *   npx ts-node scripts/run-feed.ts
 *
 * 외부 스케줄러(cron 등)에서 주기적으로 실행합니다.
 *
 * 종료 코드:
 *   0 - 실행 완료 (추출/저장 실패 포함, 로그로만 보고)
 *   1 - MongoDB 연결 확인 실패 등 초기화 실패
 */

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { FeedRunnerService } from '../src/news/services/feed-runner.service';

async function main() {
  console.log('🚀 Starting news feed run...\n');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  }).catch((error: unknown) => {
    console.error('\n❌ Failed to initialize:', error instanceof Error ? error.message : String(error));
    return process.exit(1);
  });

  const feedRunner = app.get(FeedRunnerService);
  const report = await feedRunner.run();

  console.log('\n═══════════════════════════════════════');
  console.log('📊 Feed Run Summary');
  console.log('═══════════════════════════════════════');
  console.log(`   State: ${report.state}`);
  console.log(`   Stored in MongoDB: ${report.stored ? '✅' : '❌'}`);
  console.log(`   Static JSON written: ${report.mirrored ? '✅' : '❌'}`);
  if (!report.extraction.ok) {
    console.log(`   Error: ${report.extraction.detail}`);
  }
  console.log('═══════════════════════════════════════\n');

  await app.close();
  process.exit(0);
}

main().catch((error: unknown) => {
  console.error('\n❌ Fatal Error:', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
