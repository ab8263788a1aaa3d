import { ConfigService } from '@nestjs/config';
import { DEFAULT_HTTP_TIMEOUT_MS, HttpClient } from '../../common/http/http-client';
import { MarketDataNewsAdapter, MarketDataSearchLookup } from '../adapters/market-data-news.adapter';
import { NewsSiteNewsAdapter } from '../adapters/news-site-news.adapter';
import { SOURCE_IDS, SourceId } from '../interfaces/article.interface';
import { NewsSourceAdapter } from '../interfaces/news-source-adapter.interface';

/** 마켓 데이터 API 기본 URL */
export const DEFAULT_MARKET_DATA_BASE_URL = 'https://query2.finance.yahoo.com';

/** 뉴스 사이트 기본 URL */
export const DEFAULT_NEWS_SITE_BASE_URL = 'https://www.tipranks.com';

/**
 * 뉴스 소스 설정
 */
export interface NewsSourcesConfig {
  /** 어댑터 HTTP 요청 타임아웃 (밀리초) */
  timeoutMs: number;
  marketDataBaseUrl: string;
  newsSiteBaseUrl: string;
  /** 조회 순서대로 나열된 활성 소스 */
  enabledSources: SourceId[];
}

function isSourceId(value: string): value is SourceId {
  return SOURCE_IDS.some((sourceId) => sourceId === value);
}

/**
 * 쉼표로 구분된 소스 목록을 파싱합니다
 *
 * @example
 * ```typescript
 * parseEnabledSources('news-site, market-data'); // ['news-site', 'market-data']
 * parseEnabledSources(undefined);                // ['market-data', 'news-site']
 * ```
 */
export function parseEnabledSources(value: string | undefined): SourceId[] {
  if (!value || !value.trim()) {
    return [...SOURCE_IDS];
  }

  const sources: SourceId[] = [];
  for (const item of value.split(',')) {
    const name = item.trim().toLowerCase();
    if (!name) continue;
    if (!isSourceId(name)) {
      throw new Error(`Unknown news source in NEWS_ENABLED_SOURCES: ${name}`);
    }
    if (!sources.includes(name)) {
      sources.push(name);
    }
  }
  return sources;
}

/**
 * 환경 변수에서 뉴스 소스 설정을 읽습니다
 *
 * 환경 변수:
 * - NEWS_HTTP_TIMEOUT_MS (기본: 30000)
 * - MARKET_DATA_BASE_URL
 * - NEWS_SITE_BASE_URL
 * - NEWS_ENABLED_SOURCES (기본: 전체)
 *
 * @throws {Error} 타임아웃 값이 양의 정수가 아니거나 알 수 없는 소스가 지정된 경우
 */
export function loadNewsSourcesConfig(configService: ConfigService): NewsSourcesConfig {
  const rawTimeout = configService.get<string>('NEWS_HTTP_TIMEOUT_MS');
  const timeoutMs = rawTimeout ? parseInt(rawTimeout, 10) : DEFAULT_HTTP_TIMEOUT_MS;
  if (isNaN(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`Invalid NEWS_HTTP_TIMEOUT_MS: ${rawTimeout}`);
  }

  return {
    timeoutMs,
    marketDataBaseUrl: configService.get<string>('MARKET_DATA_BASE_URL') || DEFAULT_MARKET_DATA_BASE_URL,
    newsSiteBaseUrl: configService.get<string>('NEWS_SITE_BASE_URL') || DEFAULT_NEWS_SITE_BASE_URL,
    enabledSources: parseEnabledSources(configService.get<string>('NEWS_ENABLED_SOURCES')),
  };
}

/**
 * 설정에 따라 어댑터를 생성합니다
 *
 * 각 어댑터는 자신의 HttpClient를 소유하며 close() 시 함께 해제합니다.
 */
export function createNewsSourceAdapters(config: NewsSourcesConfig): NewsSourceAdapter[] {
  return config.enabledSources.map((sourceId): NewsSourceAdapter => {
    switch (sourceId) {
      case 'market-data':
        return new MarketDataNewsAdapter(
          new MarketDataSearchLookup(
            new HttpClient({ baseUrl: config.marketDataBaseUrl, timeoutMs: config.timeoutMs }),
          ),
        );
      case 'news-site':
        return new NewsSiteNewsAdapter(
          new HttpClient({ baseUrl: config.newsSiteBaseUrl, timeoutMs: config.timeoutMs }),
        );
    }
  });
}
