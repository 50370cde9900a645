import { describe, expect, it } from 'vitest';
import { attributeOf, matchesAttributes } from './attribute-matcher';
import { firstElement } from './testing/fixtures';

describe('matchesAttributes', () => {
  it('matches keywords case-insensitively inside class lists', () => {
    const el = firstElement('<div class="Wide Login-Box"></div>', 'div');
    expect(matchesAttributes(el, ['login'])).toBe(true);
  });

  it('matches substrings of placeholder, action and aria-label', () => {
    expect(matchesAttributes(firstElement('<input placeholder="Your E-Mail">', 'input'), ['e-mail'])).toBe(true);
    expect(matchesAttributes(firstElement('<form action="/Account/SignIn"></form>', 'form'), ['signin'])).toBe(true);
    expect(matchesAttributes(firstElement('<button aria-label="Use SSO"></button>', 'button'), ['sso'])).toBe(true);
  });

  it('ignores attributes outside the inspected list', () => {
    const el = firstElement('<div title="login" data-role="login" href="/login"></div>', 'div');
    expect(matchesAttributes(el, ['login'])).toBe(false);
  });

  it('treats absent attributes as empty', () => {
    const el = firstElement('<section></section>', 'section');
    expect(attributeOf(el, 'id')).toBe('');
    expect(matchesAttributes(el, ['auth', 'login'])).toBe(false);
  });

  it('lower-cases the keywords too', () => {
    const el = firstElement('<label for="user-password"></label>', 'label');
    expect(matchesAttributes(el, ['PASSWORD'])).toBe(true);
  });
});
