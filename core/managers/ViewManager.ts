/**
 * View Manager
 * Built-in drivers: "html" (React templates), "csv".
 */

import type { ViewConfig } from '../config/CarpenterConfig.js';
import { CsvView } from '../view/CsvView.js';
import { HtmlView } from '../view/HtmlView.js';
import type { ViewDriver } from '../view/types.js';
import { Manager } from './Manager.js';
import type { DriverFactory, ManagerKind } from './types.js';

export class ViewManager extends Manager<ViewDriver, ViewConfig> {
  readonly kind: ManagerKind = 'view';

  protected creators(): Record<string, DriverFactory<ViewDriver, ViewConfig>> {
    return {
      html: (config) => new HtmlView(config.templates),
      csv: (config) => new CsvView(config.csvDelimiter),
    };
  }
}
