export const DEFAULT_USER_AGENTS: readonly string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:126.0) Gecko/20100101 Firefox/126.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:126.0) Gecko/20100101 Firefox/126.0',
];

export const ANTI_DETECTION_ARGS: readonly string[] = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
  '--disable-infobars',
  '--disable-popup-blocking',
  '--disable-notifications',
];

// Runs before any page script in every rendered context.
export const MASK_AUTOMATION_SCRIPT =
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });";

export interface Viewport {
  width: number;
  height: number;
}

export function pickUserAgent(userAgents: readonly string[], random: () => number = Math.random): string {
  const index = Math.min(userAgents.length - 1, Math.floor(random() * userAgents.length));
  return userAgents[index] ?? DEFAULT_USER_AGENTS[0];
}

export function browserLikeHeaders(userAgent: string): Record<string, string> {
  return {
    'user-agent': userAgent,
    accept:
      'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    'accept-language': 'en-US,en;q=0.9',
    'accept-encoding': 'gzip, deflate, br',
    'upgrade-insecure-requests': '1',
    'sec-fetch-dest': 'document',
    'sec-fetch-mode': 'navigate',
    'sec-fetch-site': 'none',
    'sec-fetch-user': '?1',
    dnt: '1',
    referer: 'https://www.google.com/',
  };
}

/** Uniform over 1280–1920 × 720–1080, inclusive. */
export function randomViewport(random: () => number = Math.random): Viewport {
  return {
    width: randomInt(1280, 1920, random),
    height: randomInt(720, 1080, random),
  };
}

function randomInt(min: number, max: number, random: () => number): number {
  return min + Math.floor(random() * (max - min + 1));
}
