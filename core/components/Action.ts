/**
 * Action
 * Link-style actions shown above the table or beside every row.
 */

import type { DataRecord } from '../types/index.js';

export type ActionPosition = 'table' | 'row';

export type ActionHref<TRecord extends DataRecord = DataRecord> = string | ((record: TRecord) => string);

export interface ResolvedAction {
  key: string;
  label: string;
  href: string;
  confirm: string | null;
}

export class Action<TRecord extends DataRecord = DataRecord> {
  readonly key: string;
  readonly position: ActionPosition;
  private label: string;
  private href: ActionHref<TRecord> = '#';
  private confirmMessage: string | null = null;

  constructor(key: string, position: ActionPosition, label?: string) {
    this.key = key;
    this.position = position;
    this.label = label ?? key.charAt(0).toUpperCase() + key.slice(1);
  }

  setLabel(label: string): this {
    this.label = label;
    return this;
  }

  setHref(href: ActionHref<TRecord>): this {
    this.href = href;
    return this;
  }

  confirm(message: string): this {
    this.confirmMessage = message;
    return this;
  }

  /**
   * Resolve the href. Row actions are resolved against their record;
   * a function href on a table action is an error.
   */
  resolve(record?: TRecord): ResolvedAction {
    let href: string;
    if (typeof this.href === 'string') {
      href = this.href;
    } else if (record !== undefined) {
      href = this.href(record);
    } else {
      throw new TypeError(`Action '${this.key}' needs a record to resolve its href`);
    }

    return {
      key: this.key,
      label: this.label,
      href,
      confirm: this.confirmMessage,
    };
  }
}
