import { createInputError } from '../../errors.js';

export interface FetchTarget {
  url: URL;
  /** Host plus any non-default port; the key for robots rules and rate limiting. */
  domain: string;
}

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

export function parseTarget(raw: string): FetchTarget {
  let url: URL;

  try {
    url = new URL(raw.trim());
  } catch {
    throw createInputError(`Invalid URL: ${raw}`, { url: raw });
  }

  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw createInputError('URL must use http or https protocol.', { url: raw, protocol: url.protocol });
  }

  if (!url.hostname) {
    throw createInputError('URL has no host.', { url: raw });
  }

  url.hash = '';
  return { url, domain: url.host.toLowerCase() };
}
