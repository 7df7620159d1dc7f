import type { Payload } from '@tuner-cloud/shared-types';
import { EXCLUDED_FIELDS } from './constants.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// "__proto__" も通常のキーとして複製する
function setOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      setOwn(copy, key, cloneValue(nested));
    }
    return copy;
  }
  return value;
}

/**
 * 送信前にペイロードを整形する
 *
 * 入力は変更せず、除外キーを取り除いたディープコピーを返す。
 */
export function sanitizePayload(
  payload: Payload,
  excluded: readonly string[] = EXCLUDED_FIELDS
): Payload {
  const copy: Payload = {};
  for (const [key, value] of Object.entries(payload)) {
    if (excluded.includes(key)) {
      continue;
    }
    setOwn(copy, key, cloneValue(value));
  }
  return copy;
}
