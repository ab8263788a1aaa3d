import { JsonObject } from '../interfaces/raw-record.interface';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 문자열 필드만 반환합니다 (다른 타입은 undefined)
 */
export function readString(source: JsonObject | undefined, key: string): string | undefined {
  const value = source?.[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * 객체 필드만 반환합니다 (null, 배열, 원시값은 undefined)
 */
export function readObject(source: JsonObject | undefined, key: string): JsonObject | undefined {
  const value = source?.[key];
  return isJsonObject(value) ? value : undefined;
}

export function readArray(source: JsonObject | undefined, key: string): unknown[] | undefined {
  const value = source?.[key];
  return Array.isArray(value) ? value : undefined;
}
