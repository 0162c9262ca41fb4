import type { Locator as PlaywrightLocator, Page } from 'playwright';
import type { Locator, LocatorFilters } from '../locators/types.js';
import { cssString, escapeRegExp } from '../utils/sanitize.js';

/** Anything a lookup can start from: the page or an already-located element. */
export type SearchScope = Pick<Page, 'locator' | 'getByRole' | 'getByLabel'>;

const BUTTON =
  ':is(button, input[type="submit"], input[type="reset"], input[type="button"], input[type="image"])';
const FILLABLE =
  ':is(textarea, input:not([type="submit"], [type="reset"], [type="button"], [type="image"], [type="radio"], [type="checkbox"], [type="hidden"], [type="file"]))';
const RADIO = 'input[type="radio"]';
const CHECKBOX = 'input[type="checkbox"]';
const FILE_FIELD = 'input[type="file"]';

export function byAttributes(base: string, attributes: readonly string[], value: string): string {
  const alternatives = attributes.map((attr) => `[${attr}=${cssString(value)}]`);
  return `${base}:is(${alternatives.join(', ')})`;
}

function labelledField(
  scope: SearchScope,
  base: string,
  attributes: readonly string[],
  value: string,
  exact: boolean,
): PlaywrightLocator {
  return scope
    .locator(byAttributes(base, attributes, value))
    .or(scope.getByLabel(value, { exact }).and(scope.locator(base)));
}

function links(scope: SearchScope, value: string, exact: boolean): PlaywrightLocator {
  return scope
    .locator(byAttributes('a[href]', ['id', 'title'], value))
    .or(scope.getByRole('link', { name: value, exact }));
}

function buttons(scope: SearchScope, value: string, exact: boolean): PlaywrightLocator {
  return scope
    .locator(byAttributes(BUTTON, ['id', 'name', 'value', 'title'], value))
    .or(scope.getByRole('button', { name: value, exact }));
}

function options(scope: SearchScope, value: string, exact: boolean): PlaywrightLocator {
  const hasText = exact ? new RegExp(`^\\s*${escapeRegExp(value)}\\s*$`) : value;
  return scope.locator('option').filter({ hasText });
}

function applyFilters(
  scope: SearchScope,
  candidates: PlaywrightLocator,
  filters: Readonly<LocatorFilters>,
): PlaywrightLocator {
  let filtered = candidates;
  if (filters.href !== undefined) {
    filtered = filtered.and(scope.locator(`a[href=${cssString(filters.href)}]`));
  }
  if (filters.checked !== undefined) {
    filtered = filtered.and(scope.locator(filters.checked ? ':checked' : ':not(:checked)'));
  }
  if (filters.disabled !== undefined) {
    filtered = filtered.and(scope.locator(filters.disabled ? ':disabled' : ':not(:disabled)'));
  }
  return filtered;
}

/** Every element in `scope` the locator could refer to. */
export function buildCandidates(scope: SearchScope, locator: Locator): PlaywrightLocator {
  const { kind, value, filters } = locator;
  const exact = filters.exact ?? false;

  let candidates: PlaywrightLocator;
  switch (kind) {
    case 'link':
      candidates = links(scope, value, exact);
      break;
    case 'button':
      candidates = buttons(scope, value, exact);
      break;
    case 'link-or-button':
      candidates = links(scope, value, exact).or(buttons(scope, value, exact));
      break;
    case 'fillable-field':
      candidates = labelledField(scope, FILLABLE, ['id', 'name', 'placeholder'], value, exact);
      break;
    case 'radio-button':
      candidates = labelledField(scope, RADIO, ['id', 'name'], value, exact);
      break;
    case 'checkbox':
      candidates = labelledField(scope, CHECKBOX, ['id', 'name'], value, exact);
      break;
    case 'select':
      candidates = labelledField(scope, 'select', ['id', 'name'], value, exact);
      break;
    case 'option':
      candidates = options(scope, value, exact);
      break;
    case 'file-field':
      candidates = labelledField(scope, FILE_FIELD, ['id', 'name'], value, exact);
      break;
  }

  return applyFilters(scope, candidates, filters);
}
