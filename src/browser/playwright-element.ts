import { type ElementHandle, errors, type Locator as PlaywrightLocator } from 'playwright';
import { config } from '../config.js';
import type { ElementFinder, Locator, PageElement } from '../locators/types.js';
import {
  ActionError,
  AmbiguousMatchError,
  AppError,
  ElementNotFoundError,
  StaleElementError,
} from '../utils/errors.js';
import { buildCandidates, type SearchScope } from './selectors.js';

const STALE_PATTERNS = ['not attached', 'detached', 'Execution context was destroyed'];

export interface PlaywrightFinderOptions {
  /** Driver-level timeout for each lookup and mutation, in ms. */
  actionTimeoutMs?: number;
}

/**
 * Map a driver failure onto the retry taxonomy. Only detachment and
 * actionability timeouts are transient.
 */
export function translateDriverError(action: string, err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof errors.TimeoutError) {
    return new StaleElementError(action, 'element did not become actionable in time');
  }
  const message = err instanceof Error ? err.message : String(err);
  if (STALE_PATTERNS.some((pattern) => message.includes(pattern))) {
    return new StaleElementError(action, message);
  }
  return new ActionError(action, message);
}

async function driverCall<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw translateDriverError(action, err);
  }
}

export type OptionUpdate = 'ok' | 'not-option' | 'no-select' | 'single-select';

/** Runs in the page: flips `option.selected` and fires the events a user would. */
export function setOptionSelected(node: Node, selected: boolean): OptionUpdate {
  if (!(node instanceof HTMLOptionElement)) return 'not-option';
  const select = node.closest('select');
  if (!select) return 'no-select';
  if (!selected && !select.multiple) return 'single-select';
  node.selected = selected;
  select.dispatchEvent(new Event('input', { bubbles: true }));
  select.dispatchEvent(new Event('change', { bubbles: true }));
  return 'ok';
}

export class PlaywrightFinder implements ElementFinder {
  private readonly scope: SearchScope;
  private readonly actionTimeoutMs: number;

  constructor(scope: SearchScope, options: PlaywrightFinderOptions = {}) {
    this.scope = scope;
    this.actionTimeoutMs = options.actionTimeoutMs ?? config.actionTimeoutMs;
  }

  async find(locator: Locator): Promise<PageElement> {
    const candidates = buildCandidates(this.scope, locator);
    const count = await driverCall('find', () => candidates.count());

    if (count === 0) throw new ElementNotFoundError(locator);
    if (count > 1) throw new AmbiguousMatchError(locator, count);

    // The count is the uniqueness check. A match rendered after it must not
    // trip the driver's strict mode.
    const target = candidates.first();
    const handle = await driverCall('find', () =>
      target.elementHandle({ timeout: this.actionTimeoutMs }),
    );
    return new PlaywrightElement(target, handle, this.actionTimeoutMs);
  }
}

export class PlaywrightElement implements PageElement {
  private readonly locator: PlaywrightLocator;
  private readonly handle: ElementHandle;
  private readonly timeout: number;

  constructor(locator: PlaywrightLocator, handle: ElementHandle, timeout: number) {
    this.locator = locator;
    this.handle = handle;
    this.timeout = timeout;
  }

  find(locator: Locator): Promise<PageElement> {
    return new PlaywrightFinder(this.locator, { actionTimeoutMs: this.timeout }).find(locator);
  }

  async click(): Promise<void> {
    await driverCall('click', () => this.handle.click({ timeout: this.timeout }));
  }

  async setValue(value: string): Promise<void> {
    await driverCall('set value', () => this.handle.fill(value, { timeout: this.timeout }));
  }

  async setChecked(checked: boolean): Promise<void> {
    await driverCall('set checked', () => this.handle.setChecked(checked, { timeout: this.timeout }));
  }

  async selectOption(): Promise<void> {
    await this.updateOption('select option', true);
  }

  async unselectOption(): Promise<void> {
    await this.updateOption('unselect option', false);
  }

  async attachFiles(paths: readonly string[]): Promise<void> {
    await driverCall('attach files', () =>
      this.handle.setInputFiles([...paths], { timeout: this.timeout }),
    );
  }

  private async updateOption(action: string, selected: boolean): Promise<void> {
    const result = await driverCall(action, () =>
      this.handle.evaluate(setOptionSelected, selected),
    );
    if (result === 'not-option') {
      throw new ActionError(action, 'element is not an <option>');
    }
    if (result === 'no-select') {
      throw new ActionError(action, 'option is not inside a select box');
    }
    if (result === 'single-select') {
      throw new ActionError(action, 'cannot unselect option from single select box');
    }
  }
}
