import { InvalidLocatorError } from '../utils/errors.js';
import { LOCATOR_KINDS, type Locator, type LocatorFilters, type LocatorKind } from './types.js';

const FILTER_KINDS: Record<keyof LocatorFilters, readonly LocatorKind[]> = {
  exact: LOCATOR_KINDS,
  href: ['link'],
  checked: ['radio-button', 'checkbox'],
  disabled: LOCATOR_KINDS.filter((kind) => kind !== 'option'),
};

function isLocatorKind(kind: string): kind is LocatorKind {
  return (LOCATOR_KINDS as readonly string[]).includes(kind);
}

function isFilterKey(key: string): key is keyof LocatorFilters {
  return Object.hasOwn(FILTER_KINDS, key);
}

function checkFilterValue(key: keyof LocatorFilters, value: unknown): void {
  const expected = key === 'href' ? 'string' : 'boolean';
  if (typeof value !== expected) {
    throw new InvalidLocatorError(`Filter "${key}" must be a ${expected}, got ${typeof value}`);
  }
}

/**
 * Build an immutable locator, rejecting anything that could never match.
 * Filters explicitly set to `undefined` are dropped.
 */
export function createLocator(
  kind: string,
  value: string,
  filters: LocatorFilters = {},
): Locator {
  if (!isLocatorKind(kind)) {
    throw new InvalidLocatorError(
      `Unknown locator kind "${kind}". Must be one of: ${LOCATOR_KINDS.join(', ')}`,
    );
  }
  if (typeof value !== 'string') {
    throw new InvalidLocatorError(`Locator value for ${kind} must be a string`);
  }

  const accepted: LocatorFilters = {};
  for (const [key, filterValue] of Object.entries(filters)) {
    if (filterValue === undefined) continue;
    if (!isFilterKey(key)) {
      throw new InvalidLocatorError(`Unknown filter "${key}" for ${kind}`);
    }
    if (!FILTER_KINDS[key].includes(kind)) {
      throw new InvalidLocatorError(`Filter "${key}" does not apply to ${kind}`);
    }
    checkFilterValue(key, filterValue);
    Object.assign(accepted, { [key]: filterValue });
  }

  return Object.freeze({ kind, value, filters: Object.freeze(accepted) });
}
