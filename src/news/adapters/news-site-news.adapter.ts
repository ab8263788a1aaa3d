import { HttpClient } from '../../common/http/http-client';
import { Article } from '../interfaces/article.interface';
import { NewsSiteRawRecord } from '../interfaces/raw-record.interface';
import { isJsonObject, readArray } from '../normalizers/field-accessors';
import { normalizeNewsSiteArticle } from '../normalizers/news-site.normalizer';
import { NewsSourceAdapterBase } from './news-source-adapter.base';

/** 뉴스 사이트 API 엔드포인트 */
export const NEWS_SITE_ENDPOINTS = {
  GET_NEWS: 'api/stocks/getNews',
} as const;

/**
 * 값이 없거나 비어 있는지 확인합니다 (null, 0, '', [], {})
 */
function isEmptyValue(value: unknown): boolean {
  if (!value) return true;
  if (Array.isArray(value)) return value.length === 0;
  return isJsonObject(value) && Object.keys(value).length === 0;
}

/**
 * 응답 본문에서 기사 목록을 추출합니다
 *
 * 지원 형태:
 * - { news: [...] } (비어 있지 않은 배열)
 * - { data: [...] } (news가 없거나 빈 배열/빈 객체일 때)
 * - news가 그 외의 배열이 아닌 값 → 빈 배열
 * - [...] (배열 자체)
 * - 그 외 → 빈 배열
 */
export function extractNewsSiteRecords(payload: unknown): NewsSiteRawRecord[] {
  let entries: unknown[] = [];

  if (Array.isArray(payload)) {
    entries = payload;
  } else if (isJsonObject(payload)) {
    const news = payload.news;
    if (Array.isArray(news) && news.length > 0) {
      entries = news;
    } else if (isEmptyValue(news)) {
      entries = readArray(payload, 'data') ?? [];
    }
  }

  return entries.filter(isJsonObject);
}

/**
 * 뉴스 사이트 어댑터
 *
 * GET {baseUrl}/api/stocks/getNews?ticker=AAPL
 */
export class NewsSiteNewsAdapter extends NewsSourceAdapterBase<NewsSiteRawRecord> {
  readonly sourceId = 'news-site' as const;

  constructor(private readonly httpClient: HttpClient) {
    super();
  }

  normalize(raw: NewsSiteRawRecord): Article {
    return normalizeNewsSiteArticle(raw);
  }

  close(): void {
    this.httpClient.close();
  }

  protected async fetchRawRecords(ticker: string, limit: number | null): Promise<NewsSiteRawRecord[]> {
    const payload = await this.httpClient.getJson(NEWS_SITE_ENDPOINTS.GET_NEWS, {
      params: { ticker },
    });

    const records = extractNewsSiteRecords(payload);
    return limit !== null && records.length > limit ? records.slice(0, limit) : records;
  }
}
