/**
 * Session Manager
 * Built-in drivers: "array" (in-memory), "backend" (session.backend).
 */

import type { SessionConfig } from '../config/CarpenterConfig.js';
import { ArraySession } from '../session/ArraySession.js';
import { BackendSession } from '../session/BackendSession.js';
import type { SessionDriver } from '../session/types.js';
import { Manager } from './Manager.js';
import type { DriverFactory, ManagerKind } from './types.js';

export class SessionManager extends Manager<SessionDriver, SessionConfig> {
  readonly kind: ManagerKind = 'session';

  protected creators(): Record<string, DriverFactory<SessionDriver, SessionConfig>> {
    return {
      array: () => new ArraySession(),
      backend: (config) => new BackendSession(config.backend),
    };
  }
}
