import { nanoid } from 'nanoid';
import type { Browser, BrowserContext, Page } from 'playwright';
import { Actions } from '../actions/index.js';
import { config } from '../config.js';
import { Synchronizer } from '../sync/synchronizer.js';
import { NavigationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { sanitizeUrl } from '../utils/sanitize.js';
import { PlaywrightFinder } from './playwright-element.js';

export interface SessionCreateOptions {
  viewport?: { width: number; height: number };
  defaultWaitMs?: number;
  pollIntervalMs?: number;
  actionTimeoutMs?: number;
}

/** One browser context and page, with the action facade bound to it. */
export class Session {
  readonly id: string;
  readonly context: BrowserContext;
  readonly page: Page;
  readonly synchronizer: Synchronizer;
  readonly actions: Actions;
  readonly createdAt: number;

  private constructor(
    id: string,
    context: BrowserContext,
    page: Page,
    synchronizer: Synchronizer,
    actions: Actions,
  ) {
    this.id = id;
    this.context = context;
    this.page = page;
    this.synchronizer = synchronizer;
    this.actions = actions;
    this.createdAt = Date.now();
  }

  static async create(browser: Browser, options: SessionCreateOptions = {}): Promise<Session> {
    const id = nanoid();
    const viewport = options.viewport ?? {
      width: config.viewportWidth,
      height: config.viewportHeight,
    };

    // Validate timing before opening anything that would need closing.
    const synchronizer = new Synchronizer({
      defaultWaitMs: options.defaultWaitMs,
      pollIntervalMs: options.pollIntervalMs,
    });

    const context = await browser.newContext({
      viewport,
      acceptDownloads: false,
    });
    let page: Page;
    try {
      page = await context.newPage();
    } catch (err) {
      await context.close().catch((closeErr: unknown) => {
        logger.error(
          { sessionId: id, err: closeErr },
          'Error closing context after failed page open',
        );
      });
      throw err;
    }

    const finder = new PlaywrightFinder(page, { actionTimeoutMs: options.actionTimeoutMs });
    const actions = new Actions({ finder, synchronizer });

    logger.info(
      { sessionId: id, viewport, defaultWaitMs: synchronizer.defaultWaitMs },
      'Session created',
    );

    return new Session(id, context, page, synchronizer, actions);
  }

  async visit(url: string): Promise<void> {
    const safe = sanitizeUrl(url);
    try {
      await this.page.goto(safe, { waitUntil: 'domcontentloaded' });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new NavigationError(safe, message);
    }
    logger.debug({ sessionId: this.id, url: safe }, 'Visited page');
  }

  async close(): Promise<void> {
    logger.info({ sessionId: this.id }, 'Closing session');
    try {
      await this.context.close();
    } catch (err) {
      logger.error({ sessionId: this.id, err }, 'Error closing session context');
    }
  }
}
