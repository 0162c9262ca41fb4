/**
 * Tests for the Playwright-backed finder and element (src/browser/playwright-element.ts).
 */

import { errors } from 'playwright';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  PlaywrightFinder,
  setOptionSelected,
  translateDriverError,
} from '../../src/browser/playwright-element.js';
import type { SearchScope } from '../../src/browser/selectors.js';
import { createLocator } from '../../src/locators/locator.js';
import {
  ActionError,
  AmbiguousMatchError,
  ElementNotFoundError,
  StaleElementError,
  ValidationError,
} from '../../src/utils/errors.js';

const handle = {
  click: vi.fn(),
  fill: vi.fn(),
  setChecked: vi.fn(),
  setInputFiles: vi.fn(),
  evaluate: vi.fn(),
};

const driver = {
  count: vi.fn<() => Promise<number>>(),
  elementHandle: vi.fn(),
  strictElementHandle: vi.fn(),
};

function createMockLocator(strict = true): Record<string, unknown> {
  const locator: Record<string, unknown> = {
    count: driver.count,
    elementHandle: strict ? driver.strictElementHandle : driver.elementHandle,
  };
  // Chaining and nested lookups all land on the same mock.
  for (const method of ['or', 'and', 'filter', 'locator', 'getByRole', 'getByLabel']) {
    locator[method] = () => locator;
  }
  locator.first = () => createMockLocator(false);
  return locator;
}

const scope = {
  locator: vi.fn(() => createMockLocator()),
  getByRole: vi.fn(() => createMockLocator()),
  getByLabel: vi.fn(() => createMockLocator()),
};

function createFinder(): PlaywrightFinder {
  return new PlaywrightFinder(scope as unknown as SearchScope, { actionTimeoutMs: 500 });
}

const save = createLocator('button', 'Save');

beforeEach(() => {
  vi.clearAllMocks();
  driver.count.mockResolvedValue(1);
  driver.elementHandle.mockResolvedValue(handle);
  driver.strictElementHandle.mockRejectedValue(
    new Error("strict mode violation: getByRole('button', { name: 'Save' }) resolved to 2 elements"),
  );
  handle.click.mockResolvedValue(undefined);
  handle.fill.mockResolvedValue(undefined);
  handle.setChecked.mockResolvedValue(undefined);
  handle.setInputFiles.mockResolvedValue(undefined);
  handle.evaluate.mockResolvedValue('ok');
});

describe('PlaywrightFinder.find', () => {
  it('should raise a retryable not-found error when nothing matches', async () => {
    driver.count.mockResolvedValue(0);

    const err = await createFinder().find(save).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ElementNotFoundError);
    if (!(err instanceof ElementNotFoundError)) return;
    expect(err.retryable).toBe('not_found');
    expect(err.message).toBe('Unable to find button "Save"');
    expect(driver.elementHandle).not.toHaveBeenCalled();
  });

  it('should raise a retryable ambiguous error when several elements match', async () => {
    driver.count.mockResolvedValue(3);

    const err = await createFinder().find(save).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AmbiguousMatchError);
    if (!(err instanceof AmbiguousMatchError)) return;
    expect(err.count).toBe(3);
    expect(err.retryable).toBe('ambiguous');
  });

  it('should resolve a handle with the action timeout for a single match', async () => {
    await createFinder().find(save);
    expect(driver.elementHandle).toHaveBeenCalledWith({ timeout: 500 });
  });

  it('should keep the counted match when a second one renders late', async () => {
    const element = await createFinder().find(save);

    await element.click();

    expect(driver.strictElementHandle).not.toHaveBeenCalled();
    expect(driver.elementHandle).toHaveBeenCalledTimes(1);
    expect(handle.click).toHaveBeenCalledTimes(1);
  });

  it('should treat a navigation during lookup as stale', async () => {
    driver.count.mockRejectedValue(
      new Error('Execution context was destroyed, most likely because of a navigation'),
    );

    await expect(createFinder().find(save)).rejects.toBeInstanceOf(StaleElementError);
  });
});

describe('PlaywrightElement', () => {
  it('should click with the action timeout', async () => {
    const element = await createFinder().find(save);
    await element.click();
    expect(handle.click).toHaveBeenCalledWith({ timeout: 500 });
  });

  it('should fill the value', async () => {
    const element = await createFinder().find(createLocator('fillable-field', 'Name'));
    await element.setValue('Bob');
    expect(handle.fill).toHaveBeenCalledWith('Bob', { timeout: 500 });
  });

  it('should set the checked state', async () => {
    const element = await createFinder().find(createLocator('checkbox', 'Terms'));
    await element.setChecked(false);
    expect(handle.setChecked).toHaveBeenCalledWith(false, { timeout: 500 });
  });

  it('should attach every file', async () => {
    const element = await createFinder().find(createLocator('file-field', 'Photos'));
    await element.attachFiles(['/tmp/a.png', '/tmp/b.png']);
    expect(handle.setInputFiles).toHaveBeenCalledWith(['/tmp/a.png', '/tmp/b.png'], {
      timeout: 500,
    });
  });

  it('should mark an option selected in the page', async () => {
    const element = await createFinder().find(createLocator('option', 'March'));
    await element.selectOption();
    expect(handle.evaluate).toHaveBeenCalledWith(setOptionSelected, true);
  });

  it('should refuse to unselect from a single select box', async () => {
    handle.evaluate.mockResolvedValue('single-select');
    const element = await createFinder().find(createLocator('option', 'March'));

    await expect(element.unselectOption()).rejects.toThrow(
      'Action failed: unselect option: cannot unselect option from single select box',
    );
    expect(handle.evaluate).toHaveBeenCalledWith(setOptionSelected, false);
  });

  it('should reject an option outside any select box', async () => {
    handle.evaluate.mockResolvedValue('no-select');
    const element = await createFinder().find(createLocator('option', 'March'));

    await expect(element.selectOption()).rejects.toThrow(
      'Action failed: select option: option is not inside a select box',
    );
  });

  it('should reject selecting something that is not an option', async () => {
    handle.evaluate.mockResolvedValue('not-option');
    const element = await createFinder().find(createLocator('option', 'March'));

    await expect(element.selectOption()).rejects.toBeInstanceOf(ActionError);
  });

  it('should translate a detached element into a stale error', async () => {
    handle.fill.mockRejectedValue(new Error('elementHandle.fill: Element is not attached to the DOM'));
    const element = await createFinder().find(createLocator('fillable-field', 'Name'));

    const err = await element.setValue('Bob').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StaleElementError);
    if (!(err instanceof StaleElementError)) return;
    expect(err.retryable).toBe('stale');
  });

  it('should find descendants within the element', async () => {
    const month = await createFinder().find(createLocator('select', 'Month'));
    scope.locator.mockClear();

    await month.find(createLocator('option', 'March'));

    expect(scope.locator).not.toHaveBeenCalled();
    expect(driver.count).toHaveBeenCalledTimes(2);
  });
});

describe('translateDriverError', () => {
  it('should pass application errors through unchanged', () => {
    const err = new ValidationError('bad');
    expect(translateDriverError('click', err)).toBe(err);
  });

  it('should treat driver timeouts as stale', () => {
    const err = translateDriverError('click', new errors.TimeoutError('Timeout 500ms exceeded.'));
    expect(err).toBeInstanceOf(StaleElementError);
    expect(err.message).toBe(
      'Element went stale during click: element did not become actionable in time',
    );
  });

  it('should treat anything else as a fatal action error', () => {
    const err = translateDriverError('click', new Error('Target page, context or browser has been closed'));
    expect(err).toBeInstanceOf(ActionError);
    expect(err.retryable).toBeUndefined();
    expect(err.message).toBe(
      'Action failed: click: Target page, context or browser has been closed',
    );
  });

  it('should stringify non-Error throwables', () => {
    expect(translateDriverError('fill', 'oops').message).toBe('Action failed: fill: oops');
  });
});

class FakeSelect {
  readonly events: string[] = [];

  constructor(readonly multiple: boolean) {}

  dispatchEvent(event: Event): boolean {
    this.events.push(event.type);
    return true;
  }
}

class FakeOption {
  constructor(
    readonly parent: FakeSelect | null,
    public selected = false,
  ) {}

  closest(selector: string): FakeSelect | null {
    return selector === 'select' ? this.parent : null;
  }
}

function update(node: object, selected: boolean) {
  return setOptionSelected(node as unknown as Node, selected);
}

describe('setOptionSelected', () => {
  beforeEach(() => {
    vi.stubGlobal('HTMLOptionElement', FakeOption);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should select an option and fire input then change', () => {
    const select = new FakeSelect(false);
    const option = new FakeOption(select);

    expect(update(option, true)).toBe('ok');
    expect(option.selected).toBe(true);
    expect(select.events).toEqual(['input', 'change']);
  });

  it('should refuse to unselect from a single select box', () => {
    const select = new FakeSelect(false);
    const option = new FakeOption(select, true);

    expect(update(option, false)).toBe('single-select');
    expect(option.selected).toBe(true);
    expect(select.events).toEqual([]);
  });

  it('should unselect from a multiple select box', () => {
    const select = new FakeSelect(true);
    const option = new FakeOption(select, true);

    expect(update(option, false)).toBe('ok');
    expect(option.selected).toBe(false);
    expect(select.events).toEqual(['input', 'change']);
  });

  it('should report an option with no select box', () => {
    const option = new FakeOption(null, true);

    expect(update(option, false)).toBe('no-select');
    expect(update(option, true)).toBe('no-select');
    expect(option.selected).toBe(true);
  });

  it('should report a node that is not an option', () => {
    expect(update({ closest: () => null }, true)).toBe('not-option');
  });
});
