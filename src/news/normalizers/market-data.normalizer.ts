import { formatPublishedDate } from '../../common/utils/date-format.util';
import { Article, NEUTRAL_SENTIMENT, NOT_AVAILABLE } from '../interfaces/article.interface';
import { JsonObject, MarketDataRawRecord } from '../interfaces/raw-record.interface';
import { isJsonObject, readArray, readObject, readString } from './field-accessors';

/**
 * 기사 링크를 결정합니다
 *
 * 우선순위:
 * 1. clickThroughUrl.url (clickThroughUrl이 url을 가진 객체인 경우)
 * 2. canonicalUrl.url (canonicalUrl이 객체인 경우)
 * 3. "N/A"
 */
export function resolveMarketDataLink(content: JsonObject): string {
  const clickThroughUrl = readString(readObject(content, 'clickThroughUrl'), 'url');
  if (clickThroughUrl) {
    return clickThroughUrl;
  }

  const canonical = readObject(content, 'canonicalUrl');
  if (canonical) {
    return readString(canonical, 'url') ?? NOT_AVAILABLE;
  }

  return NOT_AVAILABLE;
}

/**
 * thumbnail.resolutions의 첫 번째 항목 URL
 */
export function resolveMarketDataThumbnail(content: JsonObject): string | null {
  const resolutions = readArray(readObject(content, 'thumbnail'), 'resolutions');
  const first = resolutions?.[0];
  if (!isJsonObject(first)) {
    return null;
  }
  return readString(first, 'url') ?? null;
}

/**
 * 마켓 데이터 원본 레코드를 표준 기사로 변환합니다
 *
 * nested/flat 레이아웃 모두 content 객체에서 같은 필드를 읽습니다.
 * ticker는 집계기가 채우므로 null로 둡니다.
 */
export function normalizeMarketDataArticle(record: MarketDataRawRecord): Article {
  const { content } = record;

  return {
    title: readString(content, 'title') ?? NOT_AVAILABLE,
    summary: readString(content, 'summary') ?? readString(content, 'description') ?? NOT_AVAILABLE,
    url: resolveMarketDataLink(content),
    publisher: readString(readObject(content, 'provider'), 'displayName') ?? NOT_AVAILABLE,
    published_date: formatPublishedDate(readString(content, 'pubDate') ?? readString(content, 'displayTime')),
    sentiment: NEUTRAL_SENTIMENT,
    source: 'market-data',
    ticker: null,
    thumbnail: resolveMarketDataThumbnail(content),
    content_type: readString(content, 'contentType') ?? 'article',
    raw_data: record.raw,
  };
}
