import { describe, expect, it } from 'vitest';
import { BrowserPool, resolveExecutablePath, SYSTEM_CHROMIUM } from './browser-pool';

describe('resolveExecutablePath', () => {
  it('prefers the configured path', () => {
    expect(resolveExecutablePath('/opt/chrome', () => true)).toBe('/opt/chrome');
  });

  it('uses the system Chromium when installed', () => {
    expect(resolveExecutablePath(undefined, (path) => path === SYSTEM_CHROMIUM)).toBe(SYSTEM_CHROMIUM);
  });

  it("leaves the choice to Playwright otherwise", () => {
    expect(resolveExecutablePath(undefined, () => false)).toBeUndefined();
  });
});

describe('BrowserPool', () => {
  it('starts idle and unlaunched', async () => {
    const pool = new BrowserPool({ executablePath: '/opt/chrome' });

    expect(pool.isHealthy()).toBe(false);
    expect(pool.getStatus()).toMatchObject({ healthy: false, isInitializing: false });
    await expect(pool.closeBrowser('REQ-test')).resolves.toBeUndefined();
  });
});
