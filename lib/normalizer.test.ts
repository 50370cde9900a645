import { describe, expect, it } from 'vitest';
import { extractTitle, normalizeDocument, NO_TITLE, parseDocument } from './normalizer';

describe('normalizeDocument', () => {
  it('removes script, style and noscript subtrees', () => {
    const $ = normalizeDocument(
      parseDocument(
        '<body><script>var password = "x";</script><style>.login{}</style>' +
          '<noscript><input type="password"></noscript><p id="keep">text</p></body>'
      )
    );

    expect($('script').length).toBe(0);
    expect($('style').length).toBe(0);
    expect($('noscript').length).toBe(0);
    expect($.html($('body'))).toBe('<body><p id="keep">text</p></body>');
  });

  it('removes comments nested anywhere, including before <html>', () => {
    const $ = normalizeDocument(
      parseDocument(
        '<!-- top --><html><head><title>T</title></head>' +
          '<body><div><!-- <form id="login"></form> --><p>x</p></div></body></html>'
      )
    );

    expect($.html()).toBe('<html><head><title>T</title></head><body><div><p>x</p></div></body></html>');
  });

  it('keeps attribute values and sibling order', () => {
    const $ = normalizeDocument(
      parseDocument('<ul><li class="A b" data-x="Y">1</li><script></script><li>2</li><!-- c --><li>3</li></ul>')
    );

    expect($.html($('ul'))).toBe('<ul><li class="A b" data-x="Y">1</li><li>2</li><li>3</li></ul>');
  });
});

describe('extractTitle', () => {
  it('returns the trimmed text of the first title', () => {
    const $ = parseDocument('<html><head><title>  Sign in to Acme  </title></head><body></body></html>');
    expect(extractTitle($)).toBe('Sign in to Acme');
  });

  it('falls back to a placeholder when there is no title', () => {
    expect(extractTitle(parseDocument('<p>no head here</p>'))).toBe(NO_TITLE);
    expect(NO_TITLE).toBe('No title');
  });
});
