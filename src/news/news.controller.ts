import { Controller, Get, Header, HttpException, HttpStatus, Logger, Param, Query } from '@nestjs/common';
import {
  FetchError,
  UnknownSourceError,
  ValidationError,
  getErrorMessage,
} from '../common/errors/news-errors';
import { Article, SourceId, UnifiedResult } from './interfaces/article.interface';
import { NewsAggregatorService } from './news-aggregator.service';

/**
 * 뉴스 조회 API 컨트롤러
 *
 * 집계 서비스를 HTTP로 노출합니다.
 */
@Controller('news')
export class NewsController {
  private readonly logger = new Logger(NewsController.name);

  constructor(private readonly newsAggregator: NewsAggregatorService) {}

  /**
   * 설정된 소스 목록
   *
   * GET /news/sources
   */
  @Get('sources')
  getSources(): { sources: SourceId[] } {
    return { sources: this.newsAggregator.getAvailableSources() };
  }

  /**
   * 통합 뉴스 조회
   *
   * GET /news/AAPL?limit=5
   */
  @Get(':ticker')
  async getUnifiedNews(
    @Param('ticker') ticker: string,
    @Query('limit') limit?: string,
  ): Promise<UnifiedResult> {
    try {
      return await this.newsAggregator.getUnifiedNews(ticker, this.parseLimit(limit));
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  /**
   * 통합 뉴스 텍스트 리포트
   *
   * GET /news/AAPL/summary?limit=5
   */
  @Get(':ticker/summary')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  async getNewsSummary(
    @Param('ticker') ticker: string,
    @Query('limit') limit?: string,
  ): Promise<string> {
    return this.newsAggregator.getNewsSummary(ticker, this.parseLimit(limit) ?? 5);
  }

  /**
   * 키워드 검색
   *
   * GET /news/AAPL/search?keyword=earnings&limit=10
   */
  @Get(':ticker/search')
  async searchNews(
    @Param('ticker') ticker: string,
    @Query('keyword') keyword?: string,
    @Query('limit') limit?: string,
  ): Promise<{ ticker: string; keyword: string; articles: Article[] }> {
    try {
      const articles = await this.newsAggregator.searchNewsByKeyword(
        ticker,
        keyword ?? '',
        this.parseLimit(limit) ?? 10,
      );
      return { ticker: ticker.trim().toUpperCase(), keyword: keyword ?? '', articles };
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  /**
   * 단일 소스 뉴스 조회
   *
   * GET /news/AAPL/sources/news-site?limit=5
   */
  @Get(':ticker/sources/:source')
  async getNewsBySource(
    @Param('ticker') ticker: string,
    @Param('source') source: string,
    @Query('limit') limit?: string,
  ): Promise<Article[]> {
    try {
      return await this.newsAggregator.getNewsBySource(ticker, source, this.parseLimit(limit));
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  private parseLimit(limit?: string): number | undefined {
    if (limit === undefined || limit === '') {
      return undefined;
    }

    const parsed = Number(limit);
    if (!limit.trim() || !Number.isInteger(parsed) || parsed < 0) {
      throw new HttpException(`Invalid limit: ${limit}`, HttpStatus.BAD_REQUEST);
    }
    return parsed;
  }

  /**
   * 도메인 에러를 HTTP 에러로 변환합니다
   *
   * - HttpException → 그대로
   * - ValidationError → 400
   * - UnknownSourceError → 404
   * - FetchError → 502
   * - 그 외 → 500
   */
  private toHttpException(error: unknown): HttpException {
    if (error instanceof HttpException) {
      return error;
    }
    if (error instanceof ValidationError) {
      return new HttpException(error.message, HttpStatus.BAD_REQUEST);
    }
    if (error instanceof UnknownSourceError) {
      return new HttpException(error.message, HttpStatus.NOT_FOUND);
    }
    if (error instanceof FetchError) {
      return new HttpException(error.message, HttpStatus.BAD_GATEWAY);
    }

    this.logger.error('Failed to fetch news:', getErrorMessage(error));
    return new HttpException('Failed to fetch news', HttpStatus.INTERNAL_SERVER_ERROR);
  }
}
