/**
 * Text form of presented values for HTML output.
 */

import { isBlankValue } from '../types/index.js';

export function formatDisplayValue(value: unknown): string {
  if (isBlankValue(value)) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}
