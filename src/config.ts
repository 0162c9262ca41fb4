type BrowserType = 'chromium' | 'firefox' | 'webkit';

function envInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envBool(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

function envBrowser(key: string, fallback: BrowserType): BrowserType {
  const raw = process.env[key];
  if (raw === 'chromium' || raw === 'firefox' || raw === 'webkit') return raw;
  return fallback;
}

export const config = {
  defaultWaitMs: envInt('SETTLE_DEFAULT_WAIT_MS', 2_000),
  pollIntervalMs: envInt('SETTLE_POLL_INTERVAL_MS', 50),
  actionTimeoutMs: envInt('SETTLE_ACTION_TIMEOUT_MS', 1_000),
  headless: envBool('SETTLE_HEADLESS', true),
  browser: envBrowser('SETTLE_BROWSER', 'chromium'),
  viewportWidth: envInt('SETTLE_VIEWPORT_WIDTH', 1280),
  viewportHeight: envInt('SETTLE_VIEWPORT_HEIGHT', 720),
} as const;

export type Config = typeof config;
export type { BrowserType };
