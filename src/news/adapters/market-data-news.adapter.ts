import { HttpClient } from '../../common/http/http-client';
import { Article } from '../interfaces/article.interface';
import { MarketDataRawRecord } from '../interfaces/raw-record.interface';
import { normalizeMarketDataArticle } from '../normalizers/market-data.normalizer';
import { isJsonObject, readArray, readString } from '../normalizers/field-accessors';
import { NewsSourceAdapterBase } from './news-source-adapter.base';

/** 마켓 데이터 검색 API 경로 */
export const MARKET_DATA_SEARCH_PATH = 'v1/finance/search';

/** limit이 없을 때 요청하는 뉴스 수 */
export const MARKET_DATA_DEFAULT_NEWS_COUNT = 20;

/**
 * 티커별 뉴스 조회 의존성
 *
 * 제공자 고유 형태의 원본 뉴스 목록을 반환합니다.
 */
export interface TickerNewsLookup {
  lookup(ticker: string, count: number | null): Promise<unknown[]>;
  close(): void;
}

/**
 * 마켓 데이터 검색 엔드포인트 기반 뉴스 조회
 *
 * GET {baseUrl}/v1/finance/search?q=AAPL&quotesCount=0&newsCount=20
 * 응답의 news 배열을 그대로 반환합니다.
 */
export class MarketDataSearchLookup implements TickerNewsLookup {
  constructor(private readonly httpClient: HttpClient) {}

  async lookup(ticker: string, count: number | null): Promise<unknown[]> {
    const payload = await this.httpClient.getJson(MARKET_DATA_SEARCH_PATH, {
      params: {
        q: ticker,
        quotesCount: 0,
        newsCount: count ?? MARKET_DATA_DEFAULT_NEWS_COUNT,
      },
    });

    if (!isJsonObject(payload)) {
      throw new Error('Malformed market data response');
    }

    return readArray(payload, 'news') ?? [];
  }

  close(): void {
    this.httpClient.close();
  }
}

/**
 * 원본 항목을 레이아웃 태그가 붙은 레코드로 파싱합니다
 *
 * - null/객체가 아닌 항목 → 건너뜀
 * - content 키가 있으면 nested (content가 null/객체가 아니면 건너뜀)
 * - content 키가 없으면 최상위 객체를 content로 사용 (flat)
 */
export function parseMarketDataRecord(entry: unknown): MarketDataRawRecord | null {
  if (!isJsonObject(entry)) {
    return null;
  }

  if (!('content' in entry)) {
    return { layout: 'flat', content: entry, raw: entry };
  }

  const content = entry.content;
  if (!isJsonObject(content)) {
    return null;
  }

  return { layout: 'nested', id: readString(entry, 'id') ?? null, content, raw: entry };
}

/**
 * 마켓 데이터 뉴스 어댑터
 */
export class MarketDataNewsAdapter extends NewsSourceAdapterBase<MarketDataRawRecord> {
  readonly sourceId = 'market-data' as const;

  constructor(private readonly newsLookup: TickerNewsLookup) {
    super();
  }

  normalize(raw: MarketDataRawRecord): Article {
    return normalizeMarketDataArticle(raw);
  }

  close(): void {
    this.newsLookup.close();
  }

  protected async fetchRawRecords(ticker: string, limit: number | null): Promise<MarketDataRawRecord[]> {
    const entries = await this.newsLookup.lookup(ticker, limit);
    const limited = limit !== null && entries.length > limit ? entries.slice(0, limit) : entries;

    const records: MarketDataRawRecord[] = [];
    for (const entry of limited) {
      const record = parseMarketDataRecord(entry);
      if (record) {
        records.push(record);
      } else {
        this.logger.debug(`Skipping empty market data entry for ${ticker}`);
      }
    }
    return records;
  }
}
