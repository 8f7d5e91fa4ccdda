import { describe, expect, it } from 'vitest';

import { getUrlHost, isValidUrl } from '../src/utils/url-validator.js';

describe('isValidUrl', () => {
  it('accepts absolute http and https URLs', () => {
    expect(isValidUrl('https://example.com/x')).toBe(true);
    expect(isValidUrl('http://example.com')).toBe(true);
    expect(isValidUrl('https://example.com:8443/path?q=1#frag')).toBe(true);
  });

  it('trims surrounding whitespace before checking', () => {
    expect(isValidUrl('  https://example.com/x \t')).toBe(true);
  });

  it('rejects strings without a scheme', () => {
    expect(isValidUrl('example.com/x')).toBe(false);
    expect(isValidUrl('www.example.com')).toBe(false);
  });

  it('rejects URLs without a host', () => {
    expect(isValidUrl('mailto:someone@example.com')).toBe(false);
    expect(isValidUrl('file:///etc/hosts')).toBe(false);
    expect(isValidUrl('https://')).toBe(false);
  });

  it('rejects URLs without a //authority part', () => {
    expect(isValidUrl('http:example.com')).toBe(false);
    expect(isValidUrl('https:/example.com')).toBe(false);
    expect(isValidUrl('https:///example.com')).toBe(false);
  });

  it('rejects empty and free-text lines', () => {
    expect(isValidUrl('')).toBe(false);
    expect(isValidUrl('   ')).toBe(false);
    expect(isValidUrl('not a url')).toBe(false);
    expect(isValidUrl('# reading list')).toBe(false);
  });

  it('accepts other schemes that carry a host', () => {
    expect(isValidUrl('ftp://files.example.com/readme')).toBe(true);
  });
});

describe('getUrlHost', () => {
  it('returns the host with its port', () => {
    expect(getUrlHost('https://example.com:8080/a')).toBe('example.com:8080');
  });

  it('lowercases the host', () => {
    expect(getUrlHost('https://Example.COM/a')).toBe('example.com');
  });

  it('returns an empty string for unparseable input', () => {
    expect(getUrlHost('nope')).toBe('');
  });
});
