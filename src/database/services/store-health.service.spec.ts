import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getConnectionToken } from '@nestjs/mongoose';
import { StoreHealthService } from './store-health.service';

describe('StoreHealthService', () => {
  const ping = jest.fn();

  async function createService(connection: object) {
    const module: TestingModule = await Test.createTestingModule({
      providers: [StoreHealthService, { provide: getConnectionToken(), useValue: connection }],
    }).compile();

    return module.get(StoreHealthService);
  }

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    ping.mockReset();
  });

  it('pings the admin database on module init', async () => {
    ping.mockResolvedValueOnce({ ok: 1 });
    const service = await createService({ db: { admin: () => ({ ping }) } });

    await expect(service.onModuleInit()).resolves.toBeUndefined();
    expect(ping).toHaveBeenCalledTimes(1);
  });

  it('rethrows a failed ping', async () => {
    ping.mockRejectedValueOnce(new Error('Authentication failed'));
    const service = await createService({ db: { admin: () => ({ ping }) } });

    await expect(service.verifyConnection()).rejects.toThrow('Authentication failed');
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'Failed to connect to MongoDB: Authentication failed',
    );
  });

  it('fails when the connection has no database handle', async () => {
    const service = await createService({ db: undefined });

    await expect(service.verifyConnection()).rejects.toThrow('connection is not open');
  });
});
