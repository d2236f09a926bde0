/**
 * HTML View
 * Renders a registered React template to static markup.
 */

import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { ViewTemplateNotFoundError } from '../errors/index.js';
import { TableTemplate } from './templates/TableTemplate.js';
import type { TableTemplateComponent, TableViewData, ViewDriver } from './types.js';

export const DEFAULT_TEMPLATES: Readonly<Record<string, TableTemplateComponent>> = {
  table: TableTemplate,
};

export class HtmlView implements ViewDriver {
  private readonly templates: Map<string, TableTemplateComponent>;

  constructor(templates: Record<string, TableTemplateComponent> = {}) {
    this.templates = new Map(Object.entries({ ...DEFAULT_TEMPLATES, ...templates }));
  }

  hasTemplate(name: string): boolean {
    return this.templates.has(name);
  }

  make(template: string, data: TableViewData): string {
    const component = this.templates.get(template);
    if (component === undefined) {
      throw new ViewTemplateNotFoundError(template);
    }
    return renderToStaticMarkup(createElement(component, { data }));
  }
}
