/**
 * Backend Session
 * Delegates to external session storage given in the session config.
 */

import { ConfigurationError } from '../errors/index.js';
import type { SessionBackend, SessionDriver } from './types.js';

export class BackendSession implements SessionDriver {
  private readonly backend: SessionBackend;

  constructor(backend: SessionBackend | undefined) {
    if (backend === undefined) {
      throw new ConfigurationError('the backend session driver requires session.backend');
    }
    this.backend = backend;
  }

  get(key: string): unknown {
    return this.backend.get(key);
  }

  put(key: string, value: unknown): void {
    this.backend.set(key, value);
  }

  has(key: string): boolean {
    return this.backend.get(key) !== undefined;
  }

  forget(key: string): void {
    this.backend.delete(key);
  }
}
