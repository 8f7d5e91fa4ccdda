import { describe, expect, it } from 'vitest';

import {
  decodeHtmlEntities,
  stripTags,
  toPlainText,
} from '../src/utils/content-cleaner.js';

describe('stripTags', () => {
  it('removes tags and keeps their text', () => {
    expect(stripTags('<p>Hello <b>world</b></p>')).toBe('Hello world');
  });

  it('removes tags that span several lines', () => {
    expect(stripTags('a<div\n  class="x"\n>b</div>')).toBe('ab');
  });
});

describe('decodeHtmlEntities', () => {
  it('decodes named entities', () => {
    expect(decodeHtmlEntities('Tom &amp; Jerry &lt;3 &quot;ok&quot;')).toBe(
      'Tom & Jerry <3 "ok"'
    );
  });

  it('decodes decimal and hex references', () => {
    expect(decodeHtmlEntities('&#65;&#x42;&#X43;')).toBe('ABC');
  });

  it('keeps unknown names and out-of-range code points as written', () => {
    expect(decodeHtmlEntities('&bogus; &#0; &#x110000;')).toBe(
      '&bogus; &#0; &#x110000;'
    );
  });

  it('decodes only one level', () => {
    expect(decodeHtmlEntities('&amp;amp;')).toBe('&amp;');
  });
});

describe('toPlainText', () => {
  it('strips markup and decodes entities', () => {
    expect(toPlainText('<p>Hello &amp; welcome</p>')).toBe('Hello & welcome');
  });

  it('keeps escaped markup as literal text', () => {
    expect(toPlainText('<code>&lt;b&gt;</code>')).toBe('<b>');
  });
});
