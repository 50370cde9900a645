/**
 * Auth Detection Rules
 *
 * ┌─────────────────────────────────────────────────────────────┐
 * │ 1. Password-anchored   input[type=password] → form / box    │
 * │ 2. Form-content        forms with auth attributes or fields │
 * │ 3. Container           div/section/main/aside with inputs   │
 * │ 4. OAuth phrase        "Sign in with ..." buttons and links │
 * │ 5. Auth link           auth hrefs with sign-in wording      │
 * └─────────────────────────────────────────────────────────────┘
 *
 * Rules are independent and run in this order over the same normalized
 * tree. The order decides which candidate survives dedup.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { attributeOf, matchesAttributes } from './attribute-matcher';
import type { Candidate, ComponentKind, DetectionKeywords } from '@/lib/types/auth.types';

/*============================================================================*
 * KEYWORDS
 *============================================================================*/

export const DEFAULT_KEYWORDS: DetectionKeywords = Object.freeze({
  authKeywords: Object.freeze([
    'login', 'log-in', 'log_in', 'signin', 'sign-in', 'sign_in',
    'auth', 'authenticate', 'credentials', 'sso', 'oauth',
    'username', 'user-name', 'user_name', 'userid',
    'password', 'passwd', 'passcode',
    'email', 'e-mail',
  ]),
  authInputNames: Object.freeze([
    'username', 'user', 'login', 'email', 'password', 'passwd',
    'pass', 'user_name', 'user_email', 'user_login',
    'session[email]', 'session[password]', 'credentials',
  ]),
  containerKeywords: Object.freeze(['login', 'signin', 'sign-in', 'auth', 'credentials']),
  oauthTextPattern: /(sign\s*in|log\s*in|continue)\s*(with|using|via)/i,
  authHrefPatterns: Object.freeze(['/auth/', '/login', '/sso', 'oauth']),
  authLinkTexts: Object.freeze(['sign in', 'log in', 'login', 'sign up']),
});

/** Placeholder checks only use the leading, login-specific part of the list. */
const PLACEHOLDER_KEYWORD_COUNT = 10;

const PASSWORD_CONTAINER_TAGS = 'div, section, main';
const SECTION_TAGS = ['div', 'section', 'main', 'aside'] as const;

/*============================================================================*
 * TYPE DEFINITIONS
 *============================================================================*/

export interface RuleContext {
  readonly $: CheerioAPI;
  readonly keywords: DetectionKeywords;
}

export interface DetectionRule {
  readonly name: string;
  detect(ctx: RuleContext): Candidate[];
}

/*============================================================================*
 * HELPERS
 *============================================================================*/

function candidate(
  $: CheerioAPI,
  kind: ComponentKind,
  element: Element,
  context: string
): Candidate {
  return { kind, markup: $.html(element).trim(), context };
}

function isPasswordInput(element: Element): boolean {
  return attributeOf(element, 'type').trim().toLowerCase() === 'password';
}

/** Visible text with whitespace runs collapsed. */
export function visibleText(node: Cheerio<Element>): string {
  return node.text().replace(/\s+/g, ' ').trim();
}

function nearestForm($: CheerioAPI, element: Element): Element | undefined {
  return $(element).parents('form').get(0);
}

function containsKeyword(value: string, keywords: readonly string[]): string | undefined {
  return keywords.find((keyword) => value.includes(keyword));
}

/*============================================================================*
 * RULE 1: PASSWORD-ANCHORED
 *============================================================================*/

export const passwordAnchoredRule: DetectionRule = {
  name: 'password-anchored',
  detect({ $, keywords }) {
    const found: Candidate[] = [];

    for (const input of $('input').toArray()) {
      if (!isPasswordInput(input)) continue;

      const form = nearestForm($, input);
      if (form) {
        found.push(candidate($, 'LoginForm', form, 'Found <form> wrapping a password input'));
        continue;
      }

      const container = $(input)
        .parents(PASSWORD_CONTAINER_TAGS)
        .toArray()
        .find((ancestor) => matchesAttributes(ancestor, keywords.authKeywords));

      if (container) {
        found.push(
          candidate(
            $,
            'AuthContainer',
            container,
            `Password input inside <${container.tagName}> container with auth attributes`
          )
        );
      } else {
        found.push(
          candidate($, 'PasswordInput', input, 'Standalone password input (no parent form detected)')
        );
      }
    }

    return found;
  },
};

/*============================================================================*
 * RULE 2: FORM CONTENT
 *============================================================================*/

/**
 * Describes the first auth signal among a form's inputs, or undefined.
 * Checked per input in order: type, name, placeholder.
 */
function authFieldSignal(
  inputs: readonly Element[],
  keywords: DetectionKeywords
): string | undefined {
  const placeholderKeywords = keywords.authKeywords.slice(0, PLACEHOLDER_KEYWORD_COUNT);

  for (const input of inputs) {
    const type = attributeOf(input, 'type').toLowerCase();
    if (type === 'password' || type === 'email') {
      return `type="${type}"`;
    }

    const name = attributeOf(input, 'name').toLowerCase();
    if (containsKeyword(name, keywords.authInputNames)) {
      return `name="${name}"`;
    }

    const placeholder = attributeOf(input, 'placeholder').toLowerCase();
    if (containsKeyword(placeholder, placeholderKeywords)) {
      return `placeholder="${placeholder}"`;
    }
  }

  return undefined;
}

export const formContentRule: DetectionRule = {
  name: 'form-content',
  detect({ $, keywords }) {
    const found: Candidate[] = [];

    for (const form of $('form').toArray()) {
      const inputs = $(form).find('input').toArray();

      // Already reported as a LoginForm by the password-anchored rule.
      const covered = inputs.some((input) => isPasswordInput(input) && nearestForm($, input) === form);
      if (covered) continue;

      if (matchesAttributes(form, keywords.authKeywords)) {
        found.push(
          candidate($, 'AuthForm', form, 'Form with auth-related attributes (id/class/action)')
        );
        continue;
      }

      const signal = authFieldSignal(inputs, keywords);
      if (signal) {
        found.push(
          candidate($, 'AuthForm', form, `Form contains auth-related input fields (${signal})`)
        );
      }
    }

    return found;
  },
};

/*============================================================================*
 * RULE 3: CONTAINER
 *============================================================================*/

export const containerRule: DetectionRule = {
  name: 'container',
  detect({ $, keywords }) {
    const found: Candidate[] = [];

    for (const tag of SECTION_TAGS) {
      for (const element of $(tag).toArray()) {
        if (!matchesAttributes(element, keywords.containerKeywords)) continue;
        if ($(element).find('input').length === 0) continue;

        found.push(
          candidate($, 'AuthSection', element, `<${tag}> with auth-related class/id + input fields`)
        );
      }
    }

    return found;
  },
};

/*============================================================================*
 * RULE 4: OAUTH PHRASE
 *============================================================================*/

export const oauthPhraseRule: DetectionRule = {
  name: 'oauth-phrase',
  detect({ $, keywords }) {
    const found: Candidate[] = [];

    for (const element of $('a, button').toArray()) {
      const match = keywords.oauthTextPattern.exec(visibleText($(element)));
      if (!match) continue;

      found.push(
        candidate($, 'OAuthButton', element, `Social or SSO login button ("${match[0]}")`)
      );
    }

    return found;
  },
};

/*============================================================================*
 * RULE 5: AUTH LINK
 *============================================================================*/

export const authLinkRule: DetectionRule = {
  name: 'auth-link',
  detect({ $, keywords }) {
    const found: Candidate[] = [];

    for (const element of $('a, button').toArray()) {
      const href = attributeOf(element, 'href').toLowerCase();
      const hrefPattern = containsKeyword(href, keywords.authHrefPatterns);
      if (!hrefPattern) continue;

      const text = visibleText($(element)).toLowerCase();
      if (!containsKeyword(text, keywords.authLinkTexts)) continue;

      found.push(
        candidate($, 'AuthLink', element, `Link pointing to auth endpoint (href contains "${hrefPattern}")`)
      );
    }

    return found;
  },
};

/*============================================================================*
 * RULE SET
 *============================================================================*/

export const RULES: readonly DetectionRule[] = [
  passwordAnchoredRule,
  formContentRule,
  containerRule,
  oauthPhraseRule,
  authLinkRule,
];

export function runRules(ctx: RuleContext, rules: readonly DetectionRule[] = RULES): Candidate[] {
  return rules.flatMap((rule) => rule.detect(ctx));
}
