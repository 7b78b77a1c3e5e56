import { createRequire } from 'node:module';

export interface RobotsRuleset {
  allows(userAgent: string, url: string): boolean;
}

// Shape of the object returned by robots-parser.
interface ParsedRobots {
  isAllowed(url: string, ua?: string): boolean | undefined;
}

const require = createRequire(import.meta.url);
const robotsParser: (url: string, contents: string) => ParsedRobots = require('robots-parser');

/**
 * Compiles a robots.txt body into an immutable ruleset. robots-parser only
 * answers for URLs on the exact origin it was fetched from, so target URLs
 * are re-based onto that origin first: rules fetched over https still apply
 * to the http form of the same host.
 */
export function parseRobotsTxt(robotsUrl: string, body: string): RobotsRuleset {
  const robots = robotsParser(robotsUrl, body);
  const origin = new URL(robotsUrl).origin;

  return Object.freeze({
    allows(userAgent: string, url: string): boolean {
      const target = new URL(url);
      const rebased = new URL(`${target.pathname}${target.search}`, origin).href;
      return robots.isAllowed(rebased, userAgent) !== false;
    },
  });
}
