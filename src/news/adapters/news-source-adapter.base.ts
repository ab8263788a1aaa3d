import { Logger } from '@nestjs/common';
import { FetchError, ValidationError, getErrorMessage } from '../../common/errors/news-errors';
import { Article, SourceId } from '../interfaces/article.interface';
import { NewsSourceAdapter } from '../interfaces/news-source-adapter.interface';

/**
 * 티커를 검증하고 정규화합니다 (공백 제거, 대문자)
 *
 * @throws {ValidationError} 문자열이 아니거나 비어 있는 경우
 */
export function normalizeTicker(ticker: unknown): string {
  if (typeof ticker !== 'string' || ticker.trim().length === 0) {
    throw new ValidationError('Ticker must be a non-empty string');
  }
  return ticker.trim().toUpperCase();
}

/**
 * limit 값을 해석합니다
 *
 * null/undefined/0 → 제한 없음(null), 양의 정수 → 그대로
 *
 * @throws {ValidationError} 음수 또는 정수가 아닌 경우
 */
export function resolveLimit(limit: number | null | undefined): number | null {
  if (limit === null || limit === undefined || limit === 0) {
    return null;
  }
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ValidationError(`Limit must be a non-negative integer, got ${limit}`);
  }
  return limit;
}

/**
 * 어댑터 공통 흐름
 *
 * 1. 티커/limit 검증 (네트워크 호출 전)
 * 2. 하위 클래스의 fetchRawRecords 호출
 * 3. 실패 시 FetchError로 변환
 */
export abstract class NewsSourceAdapterBase<TRaw> implements NewsSourceAdapter<TRaw> {
  protected readonly logger = new Logger(this.constructor.name);

  abstract readonly sourceId: SourceId;

  async fetchNews(ticker: string, limit?: number | null): Promise<TRaw[]> {
    const symbol = normalizeTicker(ticker);
    const maxRecords = resolveLimit(limit);

    try {
      const records = await this.fetchRawRecords(symbol, maxRecords);
      this.logger.debug(`Fetched ${records.length} raw records for ${symbol}`);
      return records;
    } catch (error) {
      throw new FetchError(
        `Failed to fetch news for ticker ${symbol}: ${getErrorMessage(error)}`,
        this.sourceId,
        symbol,
        error,
      );
    }
  }

  abstract normalize(raw: TRaw): Article;

  abstract close(): void;

  /**
   * 제공자 원본 레코드를 가져옵니다
   *
   * @param ticker - 정규화된 티커
   * @param limit - 최대 레코드 수, null이면 전체
   */
  protected abstract fetchRawRecords(ticker: string, limit: number | null): Promise<TRaw[]>;
}
