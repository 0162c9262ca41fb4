import { createLocator } from '../locators/locator.js';
import type { LocatorKind } from '../locators/types.js';
import { perform, splitOptions } from './options.js';
import type { ActionContext, ActionOptions } from './types.js';

// Sets an absolute state; repeating the call is a no-op, not a toggle.
async function setState(
  ctx: ActionContext,
  action: string,
  kind: LocatorKind,
  locator: string,
  checked: boolean,
  options: ActionOptions,
): Promise<void> {
  const { wait, filters } = splitOptions(action, options);
  const target = createLocator(kind, locator, filters);

  await perform(ctx, action, wait, async () => {
    const element = await ctx.finder.find(target);
    await element.setChecked(checked);
  });
}

/** Mark a radio button, found by id, name or label, as checked. */
export async function choose(
  ctx: ActionContext,
  locator: string,
  options: ActionOptions = {},
): Promise<void> {
  await setState(ctx, 'choose', 'radio-button', locator, true, options);
}

/** Check a check box found by id, name or label. */
export async function check(
  ctx: ActionContext,
  locator: string,
  options: ActionOptions = {},
): Promise<void> {
  await setState(ctx, 'check', 'checkbox', locator, true, options);
}

export async function uncheck(
  ctx: ActionContext,
  locator: string,
  options: ActionOptions = {},
): Promise<void> {
  await setState(ctx, 'uncheck', 'checkbox', locator, false, options);
}
