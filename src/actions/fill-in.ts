import { createLocator } from '../locators/locator.js';
import { ValidationError } from '../utils/errors.js';
import { isPlainObject, perform, splitOptions } from './options.js';
import type { ActionContext, FillInOptions } from './types.js';

/**
 * Fill a text field or text area found by id, name, placeholder or label.
 *
 *     await fillIn(ctx, 'Name', { with: 'Bob' });
 */
export async function fillIn(
  ctx: ActionContext,
  locator: string,
  options: Partial<FillInOptions> = {},
): Promise<void> {
  if (!isPlainObject(options) || !('with' in options)) {
    throw new ValidationError('Action "fill_in" requires an options object containing "with"');
  }
  const value = options.with;
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ValidationError('Option "with" for "fill_in" must be a string or number');
  }

  const { wait, filters } = splitOptions('fill_in', options, ['with']);
  const target = createLocator('fillable-field', locator, filters);
  const text = String(value);

  await perform(ctx, 'fill_in', wait, async () => {
    const field = await ctx.finder.find(target);
    await field.setValue(text);
  });
}
