import { chromium, type LaunchOptions } from 'playwright-core';

import { createBrowserError, createInternalError, isCrawlerError } from '../../errors.js';
import { componentLogger } from '../../logger.js';
import { ANTI_DETECTION_ARGS, type Viewport } from '../network/browserProfile.js';

// The slice of Playwright's Browser / BrowserContext / Page the fetcher relies on.
export interface NavigationResponse {
  status(): number;
}

export interface RenderedPage {
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<NavigationResponse | null>;
  content(): Promise<string>;
  url(): string;
}

export interface RenderingContext {
  addInitScript(script: string): Promise<void>;
  newPage(): Promise<RenderedPage>;
  close(): Promise<void>;
}

export interface RenderingContextOptions {
  userAgent: string;
  viewport: Viewport;
  javaScriptEnabled: boolean;
  bypassCSP: boolean;
}

export interface RenderingBrowser {
  isConnected(): boolean;
  newContext(options: RenderingContextOptions): Promise<RenderingContext>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<RenderingBrowser>;

export interface BrowserPoolOptions {
  headless: boolean;
  proxyUrl?: string;
  launcher?: BrowserLauncher;
}

const launchChromium: BrowserLauncher = (options) => chromium.launch(options);

/**
 * Owns the single headless browser behind rendered fetches. Launches on first
 * demand, relaunches once if the process has gone away, and shares one
 * in-flight launch between concurrent callers.
 */
export class BrowserPool {
  private browser?: RenderingBrowser;
  private launching?: Promise<RenderingBrowser>;
  private shutDown = false;
  private readonly launcher: BrowserLauncher;

  constructor(private readonly options: BrowserPoolOptions) {
    this.launcher = options.launcher ?? launchChromium;
  }

  async getBrowser(): Promise<RenderingBrowser> {
    if (this.shutDown) {
      throw createInternalError('Browser pool has been shut down');
    }

    if (this.browser?.isConnected()) {
      return this.browser;
    }

    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = undefined;
      });
    }

    return this.launching;
  }

  get isRunning(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  async shutdown(): Promise<void> {
    if (this.shutDown) {
      return;
    }

    this.shutDown = true;
    const logger = componentLogger('browser');

    if (this.launching) {
      try {
        await this.launching;
      } catch (error) {
        logger.warn({ err: error }, 'Browser launch failed while shutting down');
      }
    }

    const browser = this.browser;
    this.browser = undefined;

    if (browser?.isConnected()) {
      logger.info('Closing browser');
      await browser.close();
    }
  }

  private async launch(): Promise<RenderingBrowser> {
    const logger = componentLogger('browser');
    const relaunch = this.browser !== undefined;
    logger.info({ headless: this.options.headless, relaunch }, relaunch ? 'Relaunching browser' : 'Launching browser');

    try {
      const browser = await this.launcher(buildLaunchOptions(this.options));
      if (this.shutDown) {
        await browser.close();
        throw createInternalError('Browser pool was shut down during launch');
      }

      this.browser = browser;
      return browser;
    } catch (error) {
      if (isCrawlerError(error)) {
        throw error;
      }

      throw createBrowserError('Failed to launch browser', {}, { cause: error });
    }
  }
}

export function buildLaunchOptions(options: Pick<BrowserPoolOptions, 'headless' | 'proxyUrl'>): LaunchOptions {
  const launchOptions: LaunchOptions = {
    headless: options.headless,
    args: [...ANTI_DETECTION_ARGS],
  };

  if (options.proxyUrl) {
    const proxy = new URL(options.proxyUrl);
    launchOptions.proxy = {
      server: `${proxy.protocol}//${proxy.host}`,
      ...(proxy.username ? { username: decodeURIComponent(proxy.username) } : {}),
      ...(proxy.password ? { password: decodeURIComponent(proxy.password) } : {}),
    };
  }

  return launchOptions;
}
