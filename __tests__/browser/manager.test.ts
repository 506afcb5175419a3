import { describe, it, expect } from 'vitest';
import { BrowserManager } from '../../src/browser/manager.js';
import { parseConfig } from '../../src/config/index.js';

describe('BrowserManager', () => {
  it('should not launch anything until a page is requested', async () => {
    const manager = new BrowserManager(parseConfig({}, {}).browser);

    expect(manager.isLaunched).toBe(false);
    await expect(manager.close()).resolves.toBeUndefined();
    expect(manager.isLaunched).toBe(false);
  });
});
