/**
 * Array Session
 * In-memory session; state lives as long as the manager that created it.
 */

import type { SessionDriver } from './types.js';

export class ArraySession implements SessionDriver {
  private readonly values: Map<string, unknown> = new Map();

  get(key: string): unknown {
    return this.values.get(key);
  }

  put(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  forget(key: string): void {
    this.values.delete(key);
  }
}
