import { describe, expect, it } from 'vitest';

import { parseTarget } from '../src/crawler/url/parseTarget.js';

describe('parseTarget', () => {
  it('lowercases the host and keeps a non-default port in the domain', () => {
    const target = parseTarget('  http://Example.COM:8080/Path?q=1#frag ');

    expect(target.domain).toBe('example.com:8080');
    expect(target.url.href).toBe('http://example.com:8080/Path?q=1');
  });

  it('drops the default port', () => {
    expect(parseTarget('https://example.com:443/').domain).toBe('example.com');
  });

  it.each([
    ['not a url', 'Invalid URL: not a url'],
    ['ftp://example.com/file', 'URL must use http or https protocol.'],
    ['mailto:someone@example.com', 'URL must use http or https protocol.'],
  ])('rejects %s', (raw, message) => {
    expect(() => parseTarget(raw)).toThrow(message);
    try {
      parseTarget(raw);
    } catch (error) {
      expect(error).toMatchObject({ kind: 'input' });
    }
  });
});
