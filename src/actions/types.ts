import type { ElementFinder, LocatorFilters } from '../locators/types.js';
import type { Synchronizer } from '../sync/synchronizer.js';

export interface ActionContext {
  finder: ElementFinder;
  synchronizer: Synchronizer;
}

export interface ActionOptions extends LocatorFilters {
  /** Milliseconds to keep retrying; absent or 0 uses the synchronizer default. */
  wait?: number;
}

export interface SelectOptions extends ActionOptions {
  /** id, name or label of the select box to search within. */
  from?: string;
}

export interface FillInOptions extends ActionOptions {
  with: string | number;
}
