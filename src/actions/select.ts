import { createLocator } from '../locators/locator.js';
import type { ElementFinder, Locator, PageElement } from '../locators/types.js';
import { ValidationError } from '../utils/errors.js';
import { perform, splitOptions } from './options.js';
import type { ActionContext, SelectOptions } from './types.js';

interface OptionLookup {
  wait: number | undefined;
  selectBox?: Locator;
  option: Locator;
}

function buildLookup(action: string, value: string, options: SelectOptions): OptionLookup {
  const { wait, filters } = splitOptions(action, options, ['from']);
  const option = createLocator('option', value, filters);

  if (options.from === undefined) {
    return { wait, option };
  }
  if (typeof options.from !== 'string') {
    throw new ValidationError(`Option "from" for "${action}" must be a string`);
  }
  return { wait, option, selectBox: createLocator('select', options.from) };
}

/** Two-step lookup: the select box first (when named), then the option inside it. */
async function findOption(finder: ElementFinder, lookup: OptionLookup): Promise<PageElement> {
  const scope = lookup.selectBox ? await finder.find(lookup.selectBox) : finder;
  return scope.find(lookup.option);
}

/**
 * Select an option, optionally from a select box found by id, name or label.
 * Call repeatedly to pick several options of a multiple select.
 *
 *     await select(ctx, 'March', { from: 'Month' });
 */
export async function select(
  ctx: ActionContext,
  value: string,
  options: SelectOptions = {},
): Promise<void> {
  const lookup = buildLookup('select', value, options);

  await perform(ctx, 'select', lookup.wait, async () => {
    const option = await findOption(ctx.finder, lookup);
    await option.selectOption();
  });
}

export async function unselect(
  ctx: ActionContext,
  value: string,
  options: SelectOptions = {},
): Promise<void> {
  const lookup = buildLookup('unselect', value, options);

  await perform(ctx, 'unselect', lookup.wait, async () => {
    const option = await findOption(ctx.finder, lookup);
    await option.unselectOption();
  });
}
