import { describe, it, expect } from 'vitest';
import { isHttpUrl, normalizeHref } from '../../src/utils/url';

describe('normalizeHref', () => {
  it('resolves a relative href and strips the query string', () => {
    expect(normalizeHref('/job/12345?src=x', 'https://acme.tal.net/careers')).toEqual({
      ok: true,
      url: 'https://acme.tal.net/job/12345',
    });
  });

  it('strips the fragment and one trailing slash', () => {
    expect(normalizeHref('https://example.com/job/abc/#top', 'https://example.com/')).toEqual({
      ok: true,
      url: 'https://example.com/job/abc',
    });
  });

  it('removes only a single trailing slash', () => {
    expect(normalizeHref('https://example.com/job/1//', 'https://example.com/')).toEqual({
      ok: true,
      url: 'https://example.com/job/1/',
    });
  });

  it('resolves parent-relative paths against the source page', () => {
    expect(normalizeHref('../job/9', 'https://example.com/a/b/list')).toEqual({
      ok: true,
      url: 'https://example.com/a/job/9',
    });
  });

  it.each(['', '   ', '#section', 'mailto:hr@example.com', 'tel:+15550100', 'JavaScript:void(0)'])(
    'rejects non-navigable href %j',
    (href) => {
      expect(normalizeHref(href, 'https://example.com/careers')).toEqual({
        ok: false,
        failure: 'not-navigable',
      });
    }
  );

  it('reports a malformed href', () => {
    expect(normalizeHref('http://[::1', 'https://example.com/careers')).toEqual({
      ok: false,
      failure: 'malformed',
    });
  });
});

describe('isHttpUrl', () => {
  it('accepts http and https only', () => {
    expect(isHttpUrl('https://example.com')).toBe(true);
    expect(isHttpUrl('http://example.com')).toBe(true);
    expect(isHttpUrl('ftp://example.com')).toBe(false);
    expect(isHttpUrl('example.com')).toBe(false);
  });
});
