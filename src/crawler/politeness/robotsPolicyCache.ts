import pLimit, { type LimitFunction } from 'p-limit';

import { componentLogger } from '../../logger.js';
import type { RobotsDocument, RobotsLoader } from '../network/robots.js';
import { LruMap } from '../state/lruMap.js';
import { parseRobotsTxt, type RobotsRuleset } from './robotsRules.js';

export interface RobotsPolicyCacheOptions {
  capacity: number;
  loader: RobotsLoader;
  parse?: (robotsUrl: string, body: string) => RobotsRuleset;
}

/**
 * Per-domain robots.txt rulesets behind a bounded LRU. A `null` entry means
 * "no usable rules" and stays cached exactly like a parsed ruleset.
 */
export class RobotsPolicyCache {
  private readonly cache: LruMap<string, RobotsRuleset | null>;
  private readonly fetchLocks = new Map<string, LimitFunction>();
  private readonly loader: RobotsLoader;
  private readonly parse: (robotsUrl: string, body: string) => RobotsRuleset;

  constructor(options: RobotsPolicyCacheOptions) {
    this.cache = new LruMap(options.capacity);
    this.loader = options.loader;
    this.parse = options.parse ?? parseRobotsTxt;
  }

  async canFetch(url: string, userAgent: string): Promise<boolean> {
    const target = new URL(url);
    const ruleset = await this.getRuleset(target.host);

    if (!ruleset) {
      return true;
    }

    try {
      return ruleset.allows(userAgent, target.href);
    } catch (error) {
      componentLogger('robots').error(
        { err: error, url, userAgent },
        'robots.txt evaluation failed; treating URL as allowed',
      );
      return true;
    }
  }

  async getRuleset(domain: string): Promise<RobotsRuleset | null> {
    const cached = this.cache.get(domain);
    if (cached !== undefined) {
      return cached;
    }

    const lock = this.lockFor(domain);
    try {
      return await lock(async () => {
        const raced = this.cache.get(domain);
        if (raced !== undefined) {
          return raced;
        }

        const ruleset = await this.load(domain);
        this.store(domain, ruleset);
        return ruleset;
      });
    } finally {
      if (lock.activeCount === 0 && lock.pendingCount === 0 && this.fetchLocks.get(domain) === lock) {
        this.fetchLocks.delete(domain);
      }
    }
  }

  has(domain: string): boolean {
    return this.cache.has(domain);
  }

  /** Cached domains from least to most recently used. */
  domains(): string[] {
    return this.cache.keys();
  }

  get pendingFetches(): number {
    return this.fetchLocks.size;
  }

  clear(): void {
    this.cache.clear();
    this.fetchLocks.clear();
  }

  private lockFor(domain: string): LimitFunction {
    const existing = this.fetchLocks.get(domain);
    if (existing) {
      return existing;
    }

    const lock = pLimit(1);
    this.fetchLocks.set(domain, lock);
    return lock;
  }

  private async load(domain: string): Promise<RobotsRuleset | null> {
    const logger = componentLogger('robots');
    let document: RobotsDocument | null;

    try {
      document = await this.loader(domain);
    } catch (error) {
      logger.warn({ err: error, domain }, 'robots.txt loader failed; assuming permissive');
      return null;
    }

    if (!document) {
      return null;
    }

    try {
      const ruleset = this.parse(document.url, document.body);
      logger.info({ domain, url: document.url }, 'Parsed robots.txt');
      return ruleset;
    } catch (error) {
      logger.error({ err: error, domain, url: document.url }, 'Could not parse robots.txt; assuming permissive');
      return null;
    }
  }

  private store(domain: string, ruleset: RobotsRuleset | null): void {
    const evicted = this.cache.set(domain, ruleset);
    if (evicted) {
      componentLogger('robots').debug(
        { evicted: evicted[0], size: this.cache.size },
        'robots.txt cache full; evicted least recently used domain',
      );
    }
  }
}
