import { createHash } from 'node:crypto';

/** sha256 hex of the value's JSON form. */
export function hashKey(obj: unknown): string {
  return createHash('sha256').update(JSON.stringify(obj) ?? 'undefined').digest('hex');
}

/** Analysis ids: `analysis_` plus 16 hex chars over the stocks, creation time and a sequence number. */
export function analysisId(stocks: readonly string[], createdAt: number, seq: number): string {
  return `analysis_${hashKey({ stocks, createdAt, seq }).slice(0, 16)}`;
}
