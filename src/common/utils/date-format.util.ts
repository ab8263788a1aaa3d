import { Logger } from '@nestjs/common';
import { ParseError } from '../errors/news-errors';

const logger = new Logger('DateFormat');

/**
 * ISO-8601 날짜/일시 패턴
 *
 * - 날짜만: 2025-10-15
 * - 일시: 2025-10-15T05:00:35, 2025-10-15 05:00
 * - 소수 초: 2025-10-15T05:00:35.123
 * - 시간대: Z 또는 +09:00 / -0400
 */
const ISO_DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?(Z|z|[+-]\d{2}(?::?\d{2})?)?)?$/;

/**
 * 파싱된 일시 필드 (시간대 변환 없이 원본 벽시계 값 유지)
 */
export interface DateTimeFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * ISO-8601 문자열을 일시 필드로 파싱합니다
 *
 * 시간대 지정자는 형식만 검증하고 값은 변환하지 않습니다.
 *
 * @throws {ParseError} 형식이 맞지 않거나 달력상 존재하지 않는 값인 경우
 */
export function parseIsoDateTime(value: string): DateTimeFields {
  const match = ISO_DATE_TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new ParseError(`Not an ISO-8601 date: ${value}`, value);
  }

  const [, y, mo, d, h, mi, s, offset] = match;
  const fields: DateTimeFields = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: h ? Number(h) : 0,
    minute: mi ? Number(mi) : 0,
    second: s ? Number(s) : 0,
  };

  if (
    fields.month < 1 ||
    fields.month > 12 ||
    fields.day < 1 ||
    fields.day > daysInMonth(fields.year, fields.month) ||
    fields.hour > 23 ||
    fields.minute > 59 ||
    fields.second > 59
  ) {
    throw new ParseError(`Date out of range: ${value}`, value);
  }

  if (offset && offset.toUpperCase() !== 'Z') {
    const digits = offset.slice(1).replace(':', '');
    const offsetHours = Number(digits.slice(0, 2));
    const offsetMinutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
    if (offsetHours > 23 || offsetMinutes > 59) {
      throw new ParseError(`Invalid UTC offset: ${value}`, value);
    }
  }

  return fields;
}

/**
 * 일시 필드를 "YYYY-MM-DD HH:MM:SS" 형식으로 출력합니다
 */
export function formatDateTimeFields(fields: DateTimeFields): string {
  return (
    `${pad(fields.year, 4)}-${pad(fields.month)}-${pad(fields.day)} ` +
    `${pad(fields.hour)}:${pad(fields.minute)}:${pad(fields.second)}`
  );
}

/**
 * 제공자의 발행일 값을 정규화합니다
 *
 * @param value - 제공자 원본 값
 * @returns 정규화된 문자열, 파싱 실패 시 원본 문자열, 값이 없으면 null
 *
 * 처리 규칙:
 * - 문자열이 아니거나 빈 문자열 → null
 * - ISO-8601 파싱 성공 → "YYYY-MM-DD HH:MM:SS"
 * - 파싱 실패 → 원본 문자열 그대로 유지
 */
export function formatPublishedDate(value: unknown): string | null {
  if (typeof value !== 'string' || value.length === 0) {
    return null;
  }

  try {
    return formatDateTimeFields(parseIsoDateTime(value));
  } catch (error) {
    if (error instanceof ParseError) {
      logger.debug(`Keeping raw published date: ${error.message}`);
      return value;
    }
    throw error;
  }
}
