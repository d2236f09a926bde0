/**
 * Filter Clauses
 *
 * Column filters are plain data so that they can be held by a session
 * driver between requests and translated by every store driver.
 */

import { isBlankValue } from '../types/index.js';

// ===========================================================================
// Types
// ===========================================================================

export type TextOperator = 'contains' | 'equals' | 'notEquals' | 'beginsWith' | 'endsWith';

export type NumberOperator = 'gt' | 'gte' | 'lt' | 'lte';

export type FilterClause =
  | { operator: TextOperator; value: string }
  | { operator: NumberOperator; value: number }
  | { operator: 'between'; min: number; max: number }
  | { operator: 'isEmpty' }
  | { operator: 'isNotEmpty' };

export type FilterOperator = FilterClause['operator'];

/**
 * A clause bound to a column key
 */
export interface ColumnFilter {
  column: string;
  clause: FilterClause;
}

const TEXT_OPERATORS: ReadonlySet<string> = new Set<TextOperator>([
  'contains',
  'equals',
  'notEquals',
  'beginsWith',
  'endsWith',
]);

const NUMBER_OPERATORS: ReadonlySet<string> = new Set<NumberOperator>(['gt', 'gte', 'lt', 'lte']);

// ===========================================================================
// Helper Functions
// ===========================================================================

function toPlainText(value: unknown): string {
  if (isBlankValue(value)) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

/**
 * Returns NaN for values that are not numeric
 */
function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  if (value instanceof Date) {
    return value.getTime();
  }
  return NaN;
}

function isEmpty(value: unknown): boolean {
  if (isBlankValue(value)) {
    return true;
  }
  return typeof value === 'string' && value.trim() === '';
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

// ===========================================================================
// Evaluation
// ===========================================================================

/**
 * Test a field value against a clause. Text comparison is
 * case-insensitive; number operators never match non-numeric values.
 */
export function matchesFilter(clause: FilterClause, value: unknown): boolean {
  switch (clause.operator) {
    case 'isEmpty':
      return isEmpty(value);
    case 'isNotEmpty':
      return !isEmpty(value);
    case 'between': {
      const num = toNumber(value);
      return !Number.isNaN(num) && num >= clause.min && num <= clause.max;
    }
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      const num = toNumber(value);
      if (Number.isNaN(num)) {
        return false;
      }
      if (clause.operator === 'gt') return num > clause.value;
      if (clause.operator === 'gte') return num >= clause.value;
      if (clause.operator === 'lt') return num < clause.value;
      return num <= clause.value;
    }
    default:
      return matchesText(clause.operator, clause.value, value);
  }
}

function matchesText(operator: TextOperator, search: string, value: unknown): boolean {
  const text = toPlainText(value).toLowerCase();
  const needle = search.toLowerCase();
  switch (operator) {
    case 'contains':
      return text.includes(needle);
    case 'equals':
      return text === needle;
    case 'notEquals':
      return text !== needle;
    case 'beginsWith':
      return text.startsWith(needle);
    case 'endsWith':
      return text.endsWith(needle);
  }
}

/**
 * Human-readable description, used in table build logs
 */
export function describeFilter(clause: FilterClause): string {
  switch (clause.operator) {
    case 'contains':
      return `Contains "${clause.value}"`;
    case 'equals':
      return `Equals "${clause.value}"`;
    case 'notEquals':
      return `Does not equal "${clause.value}"`;
    case 'beginsWith':
      return `Begins with "${clause.value}"`;
    case 'endsWith':
      return `Ends with "${clause.value}"`;
    case 'gt':
      return `> ${clause.value}`;
    case 'gte':
      return `>= ${clause.value}`;
    case 'lt':
      return `< ${clause.value}`;
    case 'lte':
      return `<= ${clause.value}`;
    case 'between':
      return `Between ${clause.min} and ${clause.max}`;
    case 'isEmpty':
      return 'Is empty';
    case 'isNotEmpty':
      return 'Is not empty';
  }
}

// ===========================================================================
// Validation
// ===========================================================================

/**
 * Check that an unknown value (e.g. read back from a session) is a clause
 */
export function isFilterClause(value: unknown): value is FilterClause {
  if (typeof value !== 'object' || value === null || !('operator' in value)) {
    return false;
  }
  const { operator } = value;
  if (typeof operator !== 'string') {
    return false;
  }

  if (operator === 'isEmpty' || operator === 'isNotEmpty') {
    return true;
  }
  if (operator === 'between') {
    return 'min' in value && 'max' in value && isFiniteNumber(value.min) && isFiniteNumber(value.max);
  }
  if (TEXT_OPERATORS.has(operator)) {
    return 'value' in value && typeof value.value === 'string';
  }
  if (NUMBER_OPERATORS.has(operator)) {
    return 'value' in value && isFiniteNumber(value.value);
  }
  return false;
}
