import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken } from '@nestjs/mongoose';
import { NewsSnapshotService } from './news-snapshot.service';
import { NEWS_SNAPSHOT_MODEL, NewsSnapshot } from '../schemas/news-snapshot.schema';
import { CategorizedNews } from '../../news/interfaces/categorized-news.interface';

/**
 * 컬렉션을 배열로 흉내 내는 모델
 */
function createInMemoryModel() {
  const documents: NewsSnapshot[] = [];

  return {
    documents,
    deleteMany: jest.fn(() => ({
      exec: async () => {
        const deletedCount = documents.length;
        documents.splice(0, documents.length);
        return { acknowledged: true, deletedCount };
      },
    })),
    create: jest.fn(async (doc: NewsSnapshot) => {
      documents.push(doc);
      return doc;
    }),
    findOne: jest.fn(() => ({
      sort: () => ({
        exec: async () => documents[documents.length - 1] ?? null,
      }),
    })),
  };
}

const NEWS: CategorizedNews = {
  World: [],
  Business: [
    {
      headline: 'Rupee steadies',
      summary: 'The currency held firm. Traders expect calm.',
      key_points: ['Flat close', 'Low volatility'],
    },
  ],
  Technology: [],
  Entertainment: [],
  Sports: [],
  Science: [],
  Health: [],
};

describe('NewsSnapshotService', () => {
  let service: NewsSnapshotService;
  let model: ReturnType<typeof createInMemoryModel>;

  beforeEach(async () => {
    model = createInMemoryModel();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NewsSnapshotService,
        { provide: getModelToken(NEWS_SNAPSHOT_MODEL), useValue: model },
      ],
    }).compile();

    service = module.get(NewsSnapshotService);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('deletes existing documents before inserting the new snapshot', async () => {
    const result = await service.replaceSnapshot(NEWS);

    expect(model.deleteMany).toHaveBeenCalledWith({});
    expect(model.create).toHaveBeenCalledWith({ date: expect.any(Date), news: NEWS });
    expect(model.deleteMany.mock.invocationCallOrder[0]).toBeLessThan(
      model.create.mock.invocationCallOrder[0],
    );
    expect(result).toEqual({ ok: true, value: { date: expect.any(Date), news: NEWS } });
  });

  it('leaves exactly one document after running twice', async () => {
    await service.replaceSnapshot(NEWS);
    await service.replaceSnapshot(NEWS);

    expect(model.documents).toHaveLength(1);
    expect(model.documents[0].news).toEqual(NEWS);
  });

  it('returns a store-write failure instead of throwing', async () => {
    model.create.mockRejectedValueOnce(new Error('not primary'));

    const result = await service.replaceSnapshot(NEWS);

    expect(result).toEqual({
      ok: false,
      kind: 'store-write',
      detail: 'Failed to insert into MongoDB: not primary',
    });
  });

  it('returns the latest snapshot', async () => {
    await service.replaceSnapshot(NEWS);

    const latest = await service.getLatestSnapshot();

    expect(latest).toEqual({ date: expect.any(Date), news: NEWS });
  });

  it('returns null when nothing is stored', async () => {
    await expect(service.getLatestSnapshot()).resolves.toBeNull();
  });
});
