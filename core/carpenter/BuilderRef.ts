/**
 * Builder References
 *
 * A table builder is either a function or a reference to a method of a
 * registered class ("App\\Tables\\Users@list"). Class references are
 * resolved through Carpenter.registerClass(), never by name lookup in
 * the module graph.
 */

import type { Table } from '../table/Table.js';

export type TableBuilder = (table: Table) => void;

/**
 * Zero-argument constructor of a class holding builder methods
 */
export type TableClass = new () => object;

export type BuilderRef =
  | { kind: 'callable'; build: TableBuilder }
  | { kind: 'classMethod'; typeName: string; methodName: string };

export type TableBuilderInput = TableBuilder | string | BuilderRef;

export const DEFAULT_BUILDER_METHOD = 'build';

export interface ClassCallback {
  typeName: string;
  methodName: string;
}

/**
 * Split "Class@method"; the method defaults to "build". Segments after a
 * second "@" are ignored.
 */
export function parseClassCallback(reference: string): ClassCallback {
  const [typeName, methodName] = reference.split('@');
  return {
    typeName,
    methodName: methodName || DEFAULT_BUILDER_METHOD,
  };
}

export function toBuilderRef(input: TableBuilderInput): BuilderRef {
  if (typeof input === 'function') {
    return { kind: 'callable', build: input };
  }
  if (typeof input === 'string') {
    return { kind: 'classMethod', ...parseClassCallback(input) };
  }
  return input;
}
