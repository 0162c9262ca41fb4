import { type Browser, type BrowserType, chromium, firefox, webkit } from 'playwright';
import { type BrowserType as BrowserName, config } from '../config.js';
import { logger } from '../utils/logger.js';
import { Session, type SessionCreateOptions } from './session.js';

const browserTypes: Record<BrowserName, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

function isBrowserName(name: string): name is BrowserName {
  return Object.hasOwn(browserTypes, name);
}

export interface LaunchOptions {
  browser?: string;
  headless?: boolean;
}

/**
 * Owns one browser process and the sessions opened on it. Closing the
 * engine closes every session it still tracks.
 */
export class BrowserEngine {
  private browser: Browser | null = null;
  private readonly sessions = new Map<string, Session>();

  async launch(options: LaunchOptions = {}): Promise<void> {
    const name = options.browser ?? config.browser;
    if (!isBrowserName(name)) {
      throw new Error(`Unsupported browser type: ${name}`);
    }
    const headless = options.headless ?? config.headless;

    if (this.browser) {
      logger.warn('Browser already launched, closing existing instance');
      await this.close();
    }

    logger.info({ browser: name, headless }, 'Launching browser');

    const browser = await browserTypes[name].launch({
      headless,
      executablePath: process.env.SETTLE_EXECUTABLE_PATH || undefined,
      args: name === 'chromium' ? ['--no-sandbox', '--disable-dev-shm-usage'] : [],
    });
    browser.on('disconnected', () => {
      logger.warn({ openSessions: this.sessions.size }, 'Browser disconnected unexpectedly');
      this.sessions.clear();
      this.browser = null;
    });
    this.browser = browser;
  }

  getBrowser(): Browser {
    if (!this.browser) {
      throw new Error('Browser not launched. Call launch() before opening sessions.');
    }
    return this.browser;
  }

  isRunning(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async newSession(options?: SessionCreateOptions): Promise<Session> {
    const session = await Session.create(this.getBrowser(), options);
    this.sessions.set(session.id, session);
    return session;
  }

  /** Close one tracked session. Returns false for an unknown id. */
  async closeSession(id: string): Promise<boolean> {
    const session = this.sessions.get(id);
    if (!session) return false;
    this.sessions.delete(id);
    await session.close();
    return true;
  }

  async close(): Promise<void> {
    const open = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(open.map((session) => session.close()));

    if (this.browser) {
      logger.info('Closing browser');
      try {
        await this.browser.close();
      } catch (err) {
        logger.error({ err }, 'Error closing browser');
      } finally {
        this.browser = null;
      }
    }
  }
}
