import { HttpException, HttpStatus } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { FetchError, UnknownSourceError, ValidationError } from '../common/errors/news-errors';
import { NewsAggregatorService } from './news-aggregator.service';
import { NewsController } from './news.controller';

describe('NewsController', () => {
  let controller: NewsController;
  const aggregator = {
    getAvailableSources: jest.fn(),
    getUnifiedNews: jest.fn(),
    getNewsSummary: jest.fn(),
    searchNewsByKeyword: jest.fn(),
    getNewsBySource: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [NewsController],
      providers: [{ provide: NewsAggregatorService, useValue: aggregator }],
    }).compile();

    controller = moduleRef.get(NewsController);
  });

  async function statusOf(promise: Promise<unknown>): Promise<number | undefined> {
    const error = await promise.catch((e: unknown) => e);
    return error instanceof HttpException ? error.getStatus() : undefined;
  }

  it('lists sources', () => {
    aggregator.getAvailableSources.mockReturnValue(['market-data', 'news-site']);

    expect(controller.getSources()).toEqual({ sources: ['market-data', 'news-site'] });
  });

  it('passes the parsed limit through', async () => {
    aggregator.getUnifiedNews.mockResolvedValue({ ticker: 'AAPL' });

    await expect(controller.getUnifiedNews('aapl', '3')).resolves.toEqual({ ticker: 'AAPL' });
    expect(aggregator.getUnifiedNews).toHaveBeenCalledWith('aapl', 3);
  });

  it.each(['many', '2.5', '5abc', '-1', ' '])('rejects limit %p with 400', async (limit) => {
    await expect(statusOf(controller.getUnifiedNews('AAPL', limit))).resolves.toBe(HttpStatus.BAD_REQUEST);
    await expect(statusOf(controller.getNewsBySource('AAPL', 'news-site', limit))).resolves.toBe(
      HttpStatus.BAD_REQUEST,
    );
    expect(aggregator.getUnifiedNews).not.toHaveBeenCalled();
    expect(aggregator.getNewsBySource).not.toHaveBeenCalled();
  });

  it.each([
    [new ValidationError('Ticker must be a non-empty string'), HttpStatus.BAD_REQUEST],
    [new UnknownSourceError('wire', ['market-data', 'news-site']), HttpStatus.NOT_FOUND],
    [new FetchError('Failed to fetch news for ticker AAPL: HTTP 500', 'news-site', 'AAPL'), HttpStatus.BAD_GATEWAY],
    [new Error('unexpected'), HttpStatus.INTERNAL_SERVER_ERROR],
  ])('maps %p to status %p', async (error, status) => {
    aggregator.getNewsBySource.mockRejectedValue(error);

    await expect(statusOf(controller.getNewsBySource('AAPL', 'news-site'))).resolves.toBe(status);
  });

  it('uses default limits for the summary and search routes', async () => {
    aggregator.getNewsSummary.mockResolvedValue('report');
    aggregator.searchNewsByKeyword.mockResolvedValue([]);

    await expect(controller.getNewsSummary('AAPL')).resolves.toBe('report');
    await expect(controller.searchNews(' aapl ', 'earnings')).resolves.toEqual({
      ticker: 'AAPL',
      keyword: 'earnings',
      articles: [],
    });
    expect(aggregator.getNewsSummary).toHaveBeenCalledWith('AAPL', 5);
    expect(aggregator.searchNewsByKeyword).toHaveBeenCalledWith(' aapl ', 'earnings', 10);
  });

  it('maps a missing keyword to 400', async () => {
    aggregator.searchNewsByKeyword.mockRejectedValue(new ValidationError('Keyword must be a non-empty string'));

    await expect(statusOf(controller.searchNews('AAPL'))).resolves.toBe(HttpStatus.BAD_REQUEST);
  });
});
