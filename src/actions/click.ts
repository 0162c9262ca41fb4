import { createLocator } from '../locators/locator.js';
import type { LocatorKind } from '../locators/types.js';
import { perform, splitOptions } from './options.js';
import type { ActionContext, ActionOptions } from './types.js';

async function clickKind(
  ctx: ActionContext,
  action: string,
  kind: LocatorKind,
  locator: string,
  options: ActionOptions,
): Promise<void> {
  const { wait, filters } = splitOptions(action, options);
  const target = createLocator(kind, locator, filters);

  await perform(ctx, action, wait, async () => {
    const element = await ctx.finder.find(target);
    await element.click();
  });
}

/**
 * Click a link or button found by id, text, value or title (image alt text
 * included for links).
 */
export async function clickLinkOrButton(
  ctx: ActionContext,
  locator: string,
  options: ActionOptions = {},
): Promise<void> {
  await clickKind(ctx, 'click_link_or_button', 'link-or-button', locator, options);
}

export const clickOn = clickLinkOrButton;

/** Click a link by id or text, optionally requiring an exact `href`. */
export async function clickLink(
  ctx: ActionContext,
  locator: string,
  options: ActionOptions = {},
): Promise<void> {
  await clickKind(ctx, 'click_link', 'link', locator, options);
}

export async function clickButton(
  ctx: ActionContext,
  locator: string,
  options: ActionOptions = {},
): Promise<void> {
  await clickKind(ctx, 'click_button', 'button', locator, options);
}
