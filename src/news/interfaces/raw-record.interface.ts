export type JsonObject = Record<string, unknown>;

/**
 * 마켓 데이터 원본 레코드
 *
 * 제공자 스키마 변경에 따라 두 가지 레이아웃이 존재합니다.
 * - nested: 기사 필드가 content 하위 객체에 위치
 * - flat: 기사 필드가 최상위 객체에 위치
 */
export type MarketDataRawRecord =
  | {
      layout: 'nested';
      id: string | null;
      content: JsonObject;
      raw: JsonObject;
    }
  | {
      layout: 'flat';
      content: JsonObject;
      raw: JsonObject;
    };

/**
 * 뉴스 사이트 원본 레코드 (필드명 변환 없이 그대로 전달)
 */
export type NewsSiteRawRecord = JsonObject;
