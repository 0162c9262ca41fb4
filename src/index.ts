export {
  ACTION_NAMES,
  type ActionContext,
  type ActionName,
  type ActionOptions,
  type ActionParams,
  Actions,
  attachFile,
  check,
  choose,
  clickButton,
  clickLink,
  clickLinkOrButton,
  clickOn,
  executeAction,
  type FillInOptions,
  fillIn,
  type SelectOptions,
  select,
  uncheck,
  unselect,
} from './actions/index.js';
export { BrowserEngine, type LaunchOptions } from './browser/engine.js';
export {
  PlaywrightElement,
  PlaywrightFinder,
  type PlaywrightFinderOptions,
  translateDriverError,
} from './browser/playwright-element.js';
export { buildCandidates, type SearchScope } from './browser/selectors.js';
export { Session, type SessionCreateOptions } from './browser/session.js';
export { type Config, config } from './config.js';
export { createLocator } from './locators/locator.js';
export {
  type ElementFinder,
  LOCATOR_KINDS,
  type Locator,
  type LocatorFilters,
  type LocatorKind,
  type PageElement,
} from './locators/types.js';
export {
  type AttemptOutcome,
  type Clock,
  MAX_POLL_INTERVAL_MS,
  nextState,
  type SyncState,
  Synchronizer,
  type SynchronizerOptions,
  systemClock,
} from './sync/synchronizer.js';
export * from './utils/errors.js';
export { logger } from './utils/logger.js';
