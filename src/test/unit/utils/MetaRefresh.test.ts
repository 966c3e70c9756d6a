import { describe, expect, it } from 'vitest';
import { Option } from 'effect';
import { getMetaRefresh } from '../../../lib/utils/MetaRefresh.js';

const PAGE = 'https://example.com/a/b';
const IGNORE = ['script', 'noscript'];

const page = (head: string, body = '') =>
  `<!DOCTYPE html><html><head>${head}</head><body>${body}</body></html>`;

describe('getMetaRefresh', () => {
  it('should read the interval and resolve the target', () => {
    const html = page('<meta http-equiv="refresh" content="5; url=/next">');
    expect(getMetaRefresh(html, PAGE, IGNORE)).toEqual(
      Option.some({ interval: 5, url: 'https://example.com/next' })
    );
  });

  it('should match http-equiv case-insensitively and strip quotes', () => {
    const html = page(`<meta http-equiv="Refresh" content="0;URL='other.html'">`);
    expect(getMetaRefresh(html, PAGE, IGNORE)).toEqual(
      Option.some({ interval: 0, url: 'https://example.com/a/other.html' })
    );
  });

  it('should accept a target without the url= prefix', () => {
    const html = page('<meta http-equiv="refresh" content="1.5, /plain">');
    expect(getMetaRefresh(html, PAGE, IGNORE)).toEqual(
      Option.some({ interval: 1.5, url: 'https://example.com/plain' })
    );
  });

  it('should resolve against the base element', () => {
    const html = page(
      '<base href="https://static.example.com/root/"><meta http-equiv="refresh" content="0; url=page">'
    );
    expect(getMetaRefresh(html, PAGE, IGNORE)).toEqual(
      Option.some({ interval: 0, url: 'https://static.example.com/root/page' })
    );
  });

  it('should skip directives inside ignored tags', () => {
    const html = page(
      '',
      '<aside><meta http-equiv="refresh" content="0; url=/promo"></aside>'
    );
    expect(getMetaRefresh(html, PAGE, ['aside'])).toEqual(Option.none());
    expect(getMetaRefresh(html, PAGE, IGNORE)).toEqual(
      Option.some({ interval: 0, url: 'https://example.com/promo' })
    );
  });

  it('should not see directives inside noscript', () => {
    const html = page(
      '',
      '<noscript><meta http-equiv="refresh" content="0; url=/nojs"></noscript>'
    );
    expect(getMetaRefresh(html, PAGE, IGNORE)).toEqual(Option.none());
  });

  it('should return none for a refresh without a target', () => {
    const html = page('<meta http-equiv="refresh" content="30">');
    expect(getMetaRefresh(html, PAGE, IGNORE)).toEqual(Option.none());
  });

  it('should return none when there is no directive', () => {
    expect(getMetaRefresh(page('<title>t</title>'), PAGE, IGNORE)).toEqual(Option.none());
  });
});
