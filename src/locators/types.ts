export const LOCATOR_KINDS = [
  'link-or-button',
  'link',
  'button',
  'fillable-field',
  'radio-button',
  'checkbox',
  'select',
  'option',
  'file-field',
] as const;

export type LocatorKind = (typeof LOCATOR_KINDS)[number];

export interface LocatorFilters {
  exact?: boolean;
  href?: string; // link only
  checked?: boolean; // radio-button and checkbox only
  disabled?: boolean;
}

export interface Locator {
  readonly kind: LocatorKind;
  readonly value: string;
  readonly filters: Readonly<LocatorFilters>;
}

/**
 * Resolves a locator against the current document.
 *
 * Must throw `ElementNotFoundError` or `AmbiguousMatchError` while the match is
 * not exactly one element, and `InvalidLocatorError` when the locator can never
 * match.
 */
export interface ElementFinder {
  find(locator: Locator): Promise<PageElement>;
}

/**
 * A located element, valid for a single attempt. Mutations throw
 * `StaleElementError` once the element is no longer attached; any other
 * failure is treated as permanent.
 *
 * Finding through an element searches its descendants.
 */
export interface PageElement extends ElementFinder {
  click(): Promise<void>;
  setValue(value: string): Promise<void>;
  setChecked(checked: boolean): Promise<void>;
  selectOption(): Promise<void>;
  unselectOption(): Promise<void>;
  attachFiles(paths: readonly string[]): Promise<void>;
}
