import fs from 'node:fs';
import { createLocator } from '../locators/locator.js';
import { FileNotFoundError, ValidationError } from '../utils/errors.js';
import { perform, splitOptions } from './options.js';
import type { ActionContext, ActionOptions } from './types.js';

/**
 * Attach one or more files to a file field found by id, name or label.
 * Every path is checked before the page is touched.
 */
export async function attachFile(
  ctx: ActionContext,
  locator: string,
  paths: string | readonly string[],
  options: ActionOptions = {},
): Promise<void> {
  const files = typeof paths === 'string' ? [paths] : [...paths];
  if (files.length === 0) {
    throw new ValidationError('Action "attach_file" requires at least one file path');
  }

  for (const file of files) {
    if (!fs.existsSync(file)) {
      throw new FileNotFoundError(file);
    }
  }

  const { wait, filters } = splitOptions('attach_file', options);
  const target = createLocator('file-field', locator, filters);

  await perform(ctx, 'attach_file', wait, async () => {
    const field = await ctx.finder.find(target);
    await field.attachFiles(files);
  });
}
