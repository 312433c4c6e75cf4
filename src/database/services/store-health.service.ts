import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { getErrorMessage } from '../../common/utils/error-message.util';

/**
 * MongoDB 연결 확인 서비스
 *
 * 모듈 초기화 시 admin ping으로 연결을 확인합니다.
 * 실패하면 예외를 던져 애플리케이션 부트스트랩을 중단합니다.
 */
@Injectable()
export class StoreHealthService implements OnModuleInit {
  private readonly logger = new Logger(StoreHealthService.name);

  constructor(@InjectConnection() private readonly connection: Connection) {}

  async onModuleInit(): Promise<void> {
    await this.verifyConnection();
  }

  async verifyConnection(): Promise<void> {
    try {
      const db = this.connection.db;
      if (!db) {
        throw new Error('connection is not open');
      }
      await db.admin().ping();
      this.logger.log('Connected to MongoDB');
    } catch (error) {
      this.logger.error(`Failed to connect to MongoDB: ${getErrorMessage(error)}`);
      throw error;
    }
  }
}
