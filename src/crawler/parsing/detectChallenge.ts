import { load } from 'cheerio';

export const CHALLENGE_SCAN_LIMIT = 2_000;

const CHALLENGE_KEYWORDS = ['captcha', 'are you a robot', "verify you're human", 'recaptcha'];

/**
 * Looks for anti-bot interstitial markers in the first
 * {@link CHALLENGE_SCAN_LIMIT} characters of a page. The raw markup is
 * searched as-is (attributes, inline scripts, `<noscript>`), alongside the
 * decoded title and body text so entity-encoded phrases still match.
 */
export function detectChallenge(content: string, limit = CHALLENGE_SCAN_LIMIT): boolean {
  const prefix = content.slice(0, limit);
  if (prefix.trim().length === 0) {
    return false;
  }

  const $ = load(prefix);
  const haystack = [prefix, $('title').text(), $('body').text()]
    .join(' ')
    .replace(/\s+/g, ' ')
    .toLowerCase();

  return CHALLENGE_KEYWORDS.some((keyword) => haystack.includes(keyword));
}
