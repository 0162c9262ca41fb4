import type { LocatorFilters } from '../locators/types.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ActionContext, ActionOptions } from './types.js';

export interface ParsedOptions {
  wait: number | undefined;
  filters: LocatorFilters;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Separate the retry window from the locator filters. `wait` and the keys
 * the action itself consumes (`from` for select, `with` for fill_in) never
 * reach a lookup; any other key is left for `createLocator` to validate.
 */
export function splitOptions(
  action: string,
  options: ActionOptions,
  consumed: readonly string[] = [],
): ParsedOptions {
  if (!isPlainObject(options)) {
    throw new ValidationError(`Options for "${action}" must be a plain object`);
  }

  const { wait } = options;
  if (wait !== undefined && (typeof wait !== 'number' || !Number.isFinite(wait) || wait < 0)) {
    throw new ValidationError(`Option "wait" for "${action}" must be a non-negative number`);
  }

  const filters: LocatorFilters = {};
  for (const [key, value] of Object.entries(options)) {
    if (key !== 'wait' && !consumed.includes(key)) {
      Object.assign(filters, { [key]: value });
    }
  }

  return { wait, filters };
}

export async function perform(
  ctx: ActionContext,
  action: string,
  wait: number | undefined,
  fn: () => Promise<void>,
): Promise<void> {
  const timeoutMs = ctx.synchronizer.resolveWait(wait);
  logger.debug({ action, timeoutMs }, 'Performing action');
  await ctx.synchronizer.synchronize(timeoutMs, fn);
}
