/**
 * Value ordering shared by the in-memory store.
 * Blanks sort last in both directions; numbers and dates compare
 * numerically, everything else as text.
 */

import type { SortDirection } from '../types/index.js';
import { isInvalidDate } from '../types/index.js';

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || value === '' || isInvalidDate(value);
}

function comparable(value: unknown): number | string {
  if (typeof value === 'number') {
    return value;
  }
  if (value instanceof Date) {
    return value.getTime();
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return String(value);
}

export function compareValues(a: unknown, b: unknown, direction: SortDirection): number {
  const aBlank = isBlank(a);
  const bBlank = isBlank(b);
  if (aBlank || bBlank) {
    if (aBlank && bBlank) return 0;
    return aBlank ? 1 : -1;
  }

  const left = comparable(a);
  const right = comparable(b);

  let result: number;
  if (typeof left === 'number' && typeof right === 'number') {
    result = left - right;
  } else {
    result = String(left).localeCompare(String(right), undefined, { numeric: true, sensitivity: 'base' });
  }

  return direction === 'asc' ? result : -result;
}
