import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { UnknownSourceError, ValidationError, getErrorMessage } from '../common/errors/news-errors';
import { normalizeTicker, resolveLimit } from './adapters/news-source-adapter.base';
import { Article, NOT_AVAILABLE, SourceId, SourceResult, UnifiedResult } from './interfaces/article.interface';
import { NEWS_SOURCE_ADAPTERS, NewsSourceAdapter } from './interfaces/news-source-adapter.interface';
import { NewsSummaryFormatter } from './news-summary.formatter';

/** 정규화된 발행일 형식 ("YYYY-MM-DD HH:MM:SS") */
const CANONICAL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

/**
 * 정렬 구간
 * 0: 정규화된 날짜, 1: 파싱하지 못한 원본 문자열, 2: 날짜 없음
 */
function dateTier(publishedDate: string | null): number {
  if (publishedDate === null || publishedDate === '') return 2;
  return CANONICAL_DATE_PATTERN.test(publishedDate) ? 0 : 1;
}

/**
 * 기사를 발행일 내림차순으로 정렬합니다 (안정 정렬, 원본 배열은 유지)
 *
 * 정규화된 날짜는 고정 폭/0 채움 형식이므로 문자열 비교가 시간 순서와 같습니다.
 * 파싱하지 못한 날짜와 날짜 없는 기사는 그 뒤에 위치합니다.
 */
export function sortArticlesByDate(articles: readonly Article[]): Article[] {
  return [...articles].sort((a, b) => {
    const tierDiff = dateTier(a.published_date) - dateTier(b.published_date);
    if (tierDiff !== 0) return tierDiff;

    const keyA = a.published_date ?? '';
    const keyB = b.published_date ?? '';
    if (keyA === keyB) return 0;
    return keyA < keyB ? 1 : -1;
  });
}

/**
 * 뉴스 집계 서비스
 *
 * 설정된 모든 소스 어댑터에서 뉴스를 가져와 하나의 결과로 통합합니다.
 *
 * 처리 과정:
 * 1. 티커 검증 (네트워크 호출 전)
 * 2. 모든 어댑터 병렬 호출 (소스별 실패는 해당 소스의 error로 기록)
 * 3. 원본 레코드 정규화 및 ticker/source 지정
 * 4. 소스 순서대로 병합 후 발행일 내림차순 정렬
 */
@Injectable()
export class NewsAggregatorService implements OnModuleDestroy {
  private readonly logger = new Logger(NewsAggregatorService.name);

  constructor(
    @Inject(NEWS_SOURCE_ADAPTERS)
    private readonly adapters: NewsSourceAdapter[],
    private readonly formatter: NewsSummaryFormatter,
  ) {}

  getAvailableSources(): SourceId[] {
    return this.adapters.map((adapter) => adapter.sourceId);
  }

  /**
   * 모든 소스의 뉴스를 통합 형식으로 가져옵니다
   *
   * 한 소스의 실패는 전체 호출을 실패시키지 않습니다.
   *
   * @param ticker - 티커 심볼 (대소문자 무관)
   * @param limitPerSource - 소스별 최대 기사 수 (null/undefined면 전체)
   * @throws {ValidationError} 티커가 비어 있거나 limit이 잘못된 경우
   */
  async getUnifiedNews(ticker: string, limitPerSource?: number | null): Promise<UnifiedResult> {
    const symbol = normalizeTicker(ticker);
    resolveLimit(limitPerSource);

    const timestamp = new Date().toISOString();
    this.logger.log(`Fetching unified news for ${symbol} from ${this.adapters.length} sources`);

    const outcomes = await Promise.allSettled(
      this.adapters.map((adapter) => this.fetchNormalized(adapter, symbol, limitPerSource)),
    );

    const bySource: Partial<Record<SourceId, SourceResult>> = {};
    const merged: Article[] = [];

    outcomes.forEach((outcome, index) => {
      const { sourceId } = this.adapters[index];

      if (outcome.status === 'fulfilled') {
        bySource[sourceId] = { count: outcome.value.length, articles: outcome.value, error: null };
        merged.push(...outcome.value);
        this.logger.debug(`${sourceId}: ${outcome.value.length} articles for ${symbol}`);
      } else {
        const message = getErrorMessage(outcome.reason);
        bySource[sourceId] = { count: 0, articles: [], error: message };
        this.logger.warn(`Failed to fetch news from ${sourceId}: ${message}`);
      }
    });

    const articles = sortArticlesByDate(merged);
    this.logger.log(`Aggregated ${articles.length} articles for ${symbol}`);

    return {
      ticker: symbol,
      sources: this.getAvailableSources(),
      articles,
      by_source: bySource,
      total_articles: articles.length,
      timestamp,
    };
  }

  /**
   * 특정 소스의 뉴스만 가져옵니다
   *
   * @param sourceName - 소스 이름 (대소문자 무관)
   * @throws {UnknownSourceError} 설정되지 않은 소스
   * @throws {ValidationError} 티커가 비어 있는 경우
   * @throws {FetchError} 소스 조회 실패
   */
  async getNewsBySource(ticker: string, sourceName: string, limit?: number | null): Promise<Article[]> {
    const adapter = this.findAdapter(sourceName);
    const symbol = normalizeTicker(ticker);

    try {
      return await this.fetchNormalized(adapter, symbol, limit);
    } catch (error) {
      this.logger.error(`Failed to fetch news from ${adapter.sourceId}: ${getErrorMessage(error)}`);
      throw error;
    }
  }

  /**
   * 통합 뉴스 리포트 (오류 시에도 예외 없이 설명 문자열 반환)
   */
  async getNewsSummary(ticker: string, limitPerSource: number | null = 5): Promise<string> {
    try {
      const result = await this.getUnifiedNews(ticker, limitPerSource);
      return this.formatter.formatUnifiedSummary(result);
    } catch (error) {
      return `Error fetching news summary for ${ticker}: ${getErrorMessage(error)}`;
    }
  }

  /**
   * 단일 소스 뉴스 리포트 (오류 시에도 예외 없이 설명 문자열 반환)
   */
  async getSourceNewsSummary(ticker: string, sourceName: string, limit: number | null = 5): Promise<string> {
    try {
      const articles = await this.getNewsBySource(ticker, sourceName, limit);
      return this.formatter.formatSourceSummary(normalizeTicker(ticker), articles);
    } catch (error) {
      return `Error fetching news summary for ${ticker}: ${getErrorMessage(error)}`;
    }
  }

  /**
   * 특정 소스의 기사 제목 목록 ("N/A" 제외)
   */
  async getNewsHeadlines(ticker: string, sourceName: string, limit: number | null = 10): Promise<string[]> {
    const articles = await this.getNewsBySource(ticker, sourceName, limit);
    return articles.map((article) => article.title).filter((title) => title !== NOT_AVAILABLE);
  }

  /**
   * 제목 또는 요약에 키워드가 포함된 기사를 찾습니다 (대소문자 무관)
   *
   * @throws {ValidationError} 키워드가 비어 있는 경우
   */
  async searchNewsByKeyword(
    ticker: string,
    keyword: string,
    limitPerSource: number | null = 10,
  ): Promise<Article[]> {
    const needle = keyword.trim().toLowerCase();
    if (!needle) {
      throw new ValidationError('Keyword must be a non-empty string');
    }

    const result = await this.getUnifiedNews(ticker, limitPerSource);
    return result.articles.filter(
      (article) =>
        article.title.toLowerCase().includes(needle) || article.summary.toLowerCase().includes(needle),
    );
  }

  /**
   * 모듈 종료 시 어댑터 연결 해제
   */
  onModuleDestroy(): void {
    for (const adapter of this.adapters) {
      try {
        adapter.close();
      } catch (error) {
        this.logger.warn(`Failed to close ${adapter.sourceId} adapter: ${getErrorMessage(error)}`);
      }
    }
  }

  private findAdapter(sourceName: string): NewsSourceAdapter {
    const requested = sourceName.trim().toLowerCase();
    const adapter = this.adapters.find((candidate) => candidate.sourceId === requested);
    if (!adapter) {
      throw new UnknownSourceError(sourceName, this.getAvailableSources());
    }
    return adapter;
  }

  private async fetchNormalized(
    adapter: NewsSourceAdapter,
    symbol: string,
    limit: number | null | undefined,
  ): Promise<Article[]> {
    const records = await adapter.fetchNews(symbol, limit);
    // 병합 목록과 by_source가 같은 객체를 공유하므로 고정
    return records.map((record) =>
      Object.freeze({
        ...adapter.normalize(record),
        source: adapter.sourceId,
        ticker: symbol,
      }),
    );
  }
}
