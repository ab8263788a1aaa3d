import { Article, SourceId } from './article.interface';

/** 어댑터 목록 주입 토큰 */
export const NEWS_SOURCE_ADAPTERS = Symbol('NEWS_SOURCE_ADAPTERS');

/**
 * 뉴스 소스 어댑터
 *
 * 제공자 하나를 원본 레코드 목록으로 변환합니다.
 * 필드명 정규화는 normalize()가 위임하는 순수 함수에서만 수행합니다.
 */
export interface NewsSourceAdapter<TRaw = unknown> {
  readonly sourceId: SourceId;

  /**
   * 티커에 대한 원본 레코드를 가져옵니다
   *
   * @param ticker - 비어 있지 않은 티커 심볼
   * @param limit - 최대 레코드 수 (null/undefined/0이면 전체)
   * @throws {ValidationError} 네트워크 호출 전 티커/limit 검증 실패
   * @throws {FetchError} 네트워크, HTTP 상태, 응답 형식 오류
   */
  fetchNews(ticker: string, limit?: number | null): Promise<TRaw[]>;

  normalize(raw: TRaw): Article;

  /** 어댑터가 소유한 연결 자원을 해제합니다 */
  close(): void;
}
