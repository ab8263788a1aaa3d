/**
 * 뉴스 집계 에러 계층
 *
 * 모든 도메인 에러는 NewsAggregatorError를 상속합니다.
 * 컨트롤러는 이 타입을 기준으로 HTTP 상태 코드를 결정합니다.
 */
export class NewsAggregatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 입력값 검증 실패 (빈 티커 등)
 *
 * 네트워크 호출 이전에 발생합니다.
 */
export class ValidationError extends NewsAggregatorError {}

/**
 * 어댑터 수준의 조회 실패 (네트워크, HTTP 상태, 응답 형식)
 */
export class FetchError extends NewsAggregatorError {
  constructor(
    message: string,
    readonly sourceId: string,
    readonly ticker: string,
    readonly originalError?: unknown,
  ) {
    super(message);
  }
}

/**
 * 설정되지 않은 뉴스 소스를 요청한 경우
 */
export class UnknownSourceError extends NewsAggregatorError {
  constructor(
    readonly sourceName: string,
    readonly availableSources: readonly string[],
  ) {
    super(`Unknown source: ${sourceName}. Available sources: ${availableSources.join(', ')}`);
  }
}

/**
 * 날짜/중첩 필드 파싱 실패
 *
 * 노멀라이저 내부에서만 사용되며 호출자에게 전달되지 않습니다.
 */
export class ParseError extends NewsAggregatorError {
  constructor(
    message: string,
    readonly rawValue: unknown,
  ) {
    super(message);
  }
}

/**
 * HTTP 클라이언트 요청 실패 (비 2xx 응답, 타임아웃, JSON 디코딩 실패)
 */
export class HttpClientError extends NewsAggregatorError {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

/**
 * unknown 에러에서 메시지를 추출합니다
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
