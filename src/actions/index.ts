import { ValidationError } from '../utils/errors.js';
import { attachFile } from './attach-file.js';
import { clickButton, clickLink, clickLinkOrButton } from './click.js';
import { fillIn } from './fill-in.js';
import { select, unselect } from './select.js';
import { check, choose, uncheck } from './toggle.js';
import type { ActionContext, ActionOptions, FillInOptions, SelectOptions } from './types.js';

export type { ActionContext, ActionOptions, FillInOptions, SelectOptions } from './types.js';
export { attachFile } from './attach-file.js';
export { clickButton, clickLink, clickLinkOrButton, clickOn } from './click.js';
export { fillIn } from './fill-in.js';
export { select, unselect } from './select.js';
export { check, choose, uncheck } from './toggle.js';

export const ACTION_NAMES = [
  'click_link_or_button',
  'click_on',
  'click_link',
  'click_button',
  'fill_in',
  'choose',
  'check',
  'uncheck',
  'select',
  'unselect',
  'attach_file',
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export interface ActionParams {
  locator?: string;
  value?: string;
  paths?: string | string[];
  options?: SelectOptions & { with?: string | number };
}

function requireString(params: ActionParams, key: 'locator' | 'value', action: string): string {
  const value = params[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`Action "${action}" requires a "${key}" parameter`);
  }
  return value;
}

/**
 * Dispatch an action by name with the given parameters.
 * Used when actions arrive as data, e.g. from a recorded script.
 */
export async function executeAction(
  ctx: ActionContext,
  action: string,
  params: ActionParams,
): Promise<void> {
  const options = params.options ?? {};

  switch (action) {
    case 'click_link_or_button':
    case 'click_on':
      return clickLinkOrButton(ctx, requireString(params, 'locator', action), options);

    case 'click_link':
      return clickLink(ctx, requireString(params, 'locator', action), options);

    case 'click_button':
      return clickButton(ctx, requireString(params, 'locator', action), options);

    case 'fill_in':
      return fillIn(ctx, requireString(params, 'locator', action), options);

    case 'choose':
      return choose(ctx, requireString(params, 'locator', action), options);

    case 'check':
      return check(ctx, requireString(params, 'locator', action), options);

    case 'uncheck':
      return uncheck(ctx, requireString(params, 'locator', action), options);

    case 'select':
      return select(ctx, requireString(params, 'value', action), options);

    case 'unselect':
      return unselect(ctx, requireString(params, 'value', action), options);

    case 'attach_file': {
      const locator = requireString(params, 'locator', action);
      if (params.paths === undefined) {
        throw new ValidationError(`Action "${action}" requires a "paths" parameter`);
      }
      return attachFile(ctx, locator, params.paths, options);
    }

    default:
      throw new ValidationError(
        `Unknown action "${action}". Must be one of: ${ACTION_NAMES.join(', ')}`,
      );
  }
}

/** The action facade bound to one finder and synchronizer. */
export class Actions {
  private readonly ctx: ActionContext;

  constructor(ctx: ActionContext) {
    this.ctx = ctx;
  }

  clickLinkOrButton(locator: string, options?: ActionOptions): Promise<void> {
    return clickLinkOrButton(this.ctx, locator, options);
  }

  clickOn(locator: string, options?: ActionOptions): Promise<void> {
    return clickLinkOrButton(this.ctx, locator, options);
  }

  clickLink(locator: string, options?: ActionOptions): Promise<void> {
    return clickLink(this.ctx, locator, options);
  }

  clickButton(locator: string, options?: ActionOptions): Promise<void> {
    return clickButton(this.ctx, locator, options);
  }

  fillIn(locator: string, options?: Partial<FillInOptions>): Promise<void> {
    return fillIn(this.ctx, locator, options);
  }

  choose(locator: string, options?: ActionOptions): Promise<void> {
    return choose(this.ctx, locator, options);
  }

  check(locator: string, options?: ActionOptions): Promise<void> {
    return check(this.ctx, locator, options);
  }

  uncheck(locator: string, options?: ActionOptions): Promise<void> {
    return uncheck(this.ctx, locator, options);
  }

  select(value: string, options?: SelectOptions): Promise<void> {
    return select(this.ctx, value, options);
  }

  unselect(value: string, options?: SelectOptions): Promise<void> {
    return unselect(this.ctx, value, options);
  }

  attachFile(locator: string, paths: string | readonly string[], options?: ActionOptions): Promise<void> {
    return attachFile(this.ctx, locator, paths, options);
  }

  execute(action: string, params: ActionParams): Promise<void> {
    return executeAction(this.ctx, action, params);
  }
}
