// src/core/config/browser-config.ts
import type { BrowserType, BrowserConfig, ConfigurableBrowser } from '../types/index.js';

export const BROWSER_CONFIGS: Record<ConfigurableBrowser, BrowserConfig> = {
  chrome: {
    channel: 'chrome',
    name: 'Google Chrome',
    profileDir: 'profile-chrome',
  },
  edge: {
    channel: 'msedge',
    name: 'Microsoft Edge',
    profileDir: 'profile-edge',
  },
  chromium: {
    name: 'Chromium (bundled)',
    profileDir: 'profile-chromium',
  },
};

export const DEFAULT_BROWSER: BrowserType = 'auto';

// Profile used when the browser is still 'auto' at config time
export const AUTO_PROFILE_DIR = 'profile';
