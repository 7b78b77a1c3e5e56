import { fetch } from 'undici';

import type { RobotsScheme } from '../../types.js';
import { componentLogger } from '../../logger.js';

export interface RobotsDocument {
  url: string;
  body: string;
}

/** Resolves to `null` when the domain publishes no usable robots.txt. */
export type RobotsLoader = (domain: string) => Promise<RobotsDocument | null>;

export interface RobotsLoaderOptions {
  timeoutMs: number;
  userAgent: string;
  schemes: readonly RobotsScheme[];
}

/**
 * Tries each scheme in order. A 200 wins; a 404 means the site has no
 * robots.txt and ends the search; any other status or a transport failure
 * moves on to the next scheme.
 */
export function createRobotsLoader(options: RobotsLoaderOptions): RobotsLoader {
  return async (domain: string): Promise<RobotsDocument | null> => {
    const logger = componentLogger('robots');

    for (const scheme of options.schemes) {
      const robotsUrl = `${scheme}://${domain}/robots.txt`;

      try {
        const response = await fetch(robotsUrl, {
          redirect: 'follow',
          signal: AbortSignal.timeout(options.timeoutMs),
          headers: { 'user-agent': options.userAgent, accept: 'text/plain,*/*;q=0.8' },
        });

        if (response.status === 200) {
          const body = await response.text();
          logger.debug({ domain, url: response.url }, 'Fetched robots.txt');
          return { url: response.url || robotsUrl, body };
        }

        await response.body?.cancel();

        if (response.status === 404) {
          logger.debug({ domain, url: robotsUrl }, 'No robots.txt published');
          return null;
        }

        logger.warn(
          { domain, url: robotsUrl, status: response.status },
          `robots.txt returned HTTP ${response.status}`,
        );
      } catch (error) {
        logger.warn(
          { domain, url: robotsUrl, err: error },
          'Could not fetch robots.txt',
        );
      }
    }

    return null;
  };
}
