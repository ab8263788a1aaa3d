import { formatPublishedDate } from '../../common/utils/date-format.util';
import { Article, NEUTRAL_SENTIMENT, NOT_AVAILABLE } from '../interfaces/article.interface';
import { NewsSiteRawRecord } from '../interfaces/raw-record.interface';
import { readString } from './field-accessors';

/**
 * 뉴스 사이트 원본 레코드를 표준 기사로 변환합니다
 *
 * 이 엔드포인트는 요약과 썸네일을 제공하지 않습니다.
 */
export function normalizeNewsSiteArticle(record: NewsSiteRawRecord): Article {
  return {
    title: readString(record, 'title') ?? NOT_AVAILABLE,
    summary: NOT_AVAILABLE,
    url: readString(record, 'url') ?? readString(record, 'urlString') ?? NOT_AVAILABLE,
    publisher: readString(record, 'siteName') ?? NOT_AVAILABLE,
    published_date: formatPublishedDate(readString(record, 'date')),
    sentiment: readString(record, 'sentiment') ?? NEUTRAL_SENTIMENT,
    source: 'news-site',
    ticker: null,
    thumbnail: null,
    content_type: 'article',
    company_name: readString(record, 'companyName') ?? null,
    raw_data: record,
  };
}
