import { Logger } from '@nestjs/common';
import { Document } from '../types/analysis.types';
import { MaterialRetrieverService } from './material-retriever.service';

const doc = (overrides: Partial<Document>): Document => ({
  url: 'https://example.com/a',
  title: 'title',
  text: 'body',
  category: 'Games',
  score: 0.5,
  ...overrides,
});

describe('MaterialRetrieverService', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('deduplicates by url keeping the best score and orders by score', async () => {
    const vectorStore = {
      search: jest
        .fn()
        .mockResolvedValue([
          doc({ url: 'u1', score: 0.4 }),
          doc({ url: 'u2', score: 0.9 }),
          doc({ url: 'u1', score: 0.7, text: 'better copy' }),
          doc({ url: 'u3', score: 0.7 }),
        ]),
    };
    const service = new MaterialRetrieverService(vectorStore as never);

    const result = await service.retrieve([0.1], 'Games', 0.3, 1000);

    expect(result.map((d) => [d.url, d.score])).toEqual([
      ['u2', 0.9],
      ['u1', 0.7],
      ['u3', 0.7],
    ]);
    expect(result[1].text).toBe('better copy');
    expect(vectorStore.search).toHaveBeenCalledWith(
      [0.1],
      'Games',
      0.3,
      1000,
      undefined,
    );
  });

  it('drops documents without url, text or below the threshold', async () => {
    const vectorStore = {
      search: jest
        .fn()
        .mockResolvedValue([
          doc({ url: '' }),
          doc({ url: 'u2', text: '' }),
          doc({ url: 'u3', score: 0.1 }),
          doc({ url: 'u4', score: 0.35 }),
        ]),
    };
    const service = new MaterialRetrieverService(vectorStore as never);

    const result = await service.retrieve([0.1], 'Games', 0.3, 10);

    expect(result.map((d) => d.url)).toEqual(['u4']);
  });

  it('returns an empty list when nothing matches', async () => {
    const vectorStore = { search: jest.fn().mockResolvedValue([]) };
    const service = new MaterialRetrieverService(vectorStore as never);

    await expect(
      service.retrieve([0.1], 'Games', 0.9, 10, '2024-03-20'),
    ).resolves.toEqual([]);
  });
});
