// src/core/strategies/registry.ts
import type { BackendKind, Settings } from '../config/settings.js';
import { DumpError, ErrorCode } from '../errors.js';
import { AccountManager } from '../accounts/manager.js';
import { ApiReplayStrategy } from './api/strategy.js';
import { RettiwtTimelineClient } from './api/client.js';
import { BrowserInterceptionStrategy } from './browser/strategy.js';
import { BrowserManager } from './browser/browser.js';
import type { FetchStrategy, StrategyFactory } from './types.js';

export class StrategyRegistry {
  private factories = new Map<BackendKind, StrategyFactory>();

  register(kind: BackendKind, factory: StrategyFactory): void {
    this.factories.set(kind, factory);
  }

  async create(settings: Settings): Promise<FetchStrategy> {
    const factory = this.factories.get(settings.backend);
    if (!factory) {
      throw new DumpError(
        ErrorCode.CONFIG_INVALID,
        `No fetch backend registered for '${settings.backend}'`,
        false,
        'Use --backend api or --backend browser'
      );
    }
    return factory(settings);
  }
}

export const createApiStrategy: StrategyFactory = async (settings) => {
  const accounts = new AccountManager(settings.accountsPath);
  const apiKey = await accounts.activeApiKey();
  return new ApiReplayStrategy(new RettiwtTimelineClient(apiKey), { debug: settings.debug });
};

export const createBrowserStrategy: StrategyFactory = async (settings) => {
  const browser = new BrowserManager(settings.profileDir, {
    browserType: settings.browser,
    headless: settings.headless,
    proxy: settings.proxy,
  });
  return new BrowserInterceptionStrategy(browser, { debug: settings.debug });
};

// Singleton instance
export const registry = new StrategyRegistry();
registry.register('api', createApiStrategy);
registry.register('browser', createBrowserStrategy);
