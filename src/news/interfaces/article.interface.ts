/**
 * 설정 가능한 뉴스 소스 식별자
 */
export const SOURCE_IDS = ['market-data', 'news-site'] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

/** 제공자가 값을 주지 않은 문자열 필드의 대체값 */
export const NOT_AVAILABLE = 'N/A';

/** 감성 정보를 제공하지 않는 소스의 기본 감성 */
export const NEUTRAL_SENTIMENT = 'neutral';

/**
 * 표준 기사 (모든 소비자가 보는 제공자 독립 형태)
 *
 * 필드명은 JSON 응답 형식과 동일하게 snake_case를 사용합니다.
 */
export interface Article {
  readonly title: string;
  readonly summary: string;
  readonly url: string;
  readonly publisher: string;
  /** "YYYY-MM-DD HH:MM:SS", 파싱 불가 시 원본 문자열, 없으면 null */
  readonly published_date: string | null;
  readonly sentiment: string;
  readonly source: SourceId;
  /** 집계기가 조회한 티커로 채웁니다 */
  readonly ticker: string | null;
  readonly thumbnail: string | null;
  readonly content_type: string;
  /** 뉴스 사이트 소스 전용 */
  readonly company_name?: string | null;
  /** 제공자 원본 레코드 */
  readonly raw_data: unknown;
}

/**
 * 소스별 조회 결과
 *
 * error가 null이 아니면 조회 실패이며 articles는 비어 있습니다.
 * error 없이 articles가 비어 있으면 기사가 0건인 정상 결과입니다.
 */
export interface SourceResult {
  readonly count: number;
  readonly articles: readonly Article[];
  readonly error: string | null;
}

/**
 * 통합 뉴스 조회 결과
 *
 * by_source에는 실제로 조회한 소스(설정 순서)만 키로 존재합니다.
 */
export interface UnifiedResult {
  readonly ticker: string;
  readonly sources: readonly SourceId[];
  /** 발행일 내림차순 병합 결과 */
  readonly articles: readonly Article[];
  readonly by_source: Readonly<Partial<Record<SourceId, SourceResult>>>;
  readonly total_articles: number;
  readonly timestamp: string;
}
