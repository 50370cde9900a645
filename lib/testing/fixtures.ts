import { isTag, type Element } from 'domhandler';
import { FetchError } from '@/lib/errors';
import { normalizeDocument, parseDocument } from '@/lib/normalizer';
import { DEFAULT_KEYWORDS, type RuleContext } from '@/lib/rules';
import type { FetchedPage, PageFetcher } from '@/lib/types/fetch.types';

export function firstElement(html: string, selector: string): Element {
  const node = parseDocument(html)(selector).get(0);
  if (!node || !isTag(node)) {
    throw new Error(`fixture has no element matching ${selector}`);
  }
  return node;
}

export function ruleContext(html: string): RuleContext {
  return { $: normalizeDocument(parseDocument(html)), keywords: DEFAULT_KEYWORDS };
}

type Fixture = FetchedPage | Error | 'hang';

/**
 * In-memory PageFetcher keyed by URL.
 * `'hang'` never settles, to exercise the scanner deadline.
 */
export class FakeFetcher implements PageFetcher {
  readonly backend = 'http' as const;
  readonly calls: string[] = [];

  constructor(private readonly fixtures: Record<string, Fixture>) {}

  async fetch(url: string): Promise<FetchedPage> {
    this.calls.push(url);
    const fixture = this.fixtures[url];

    if (fixture === undefined) {
      throw FetchError.other(`no fixture for ${url}`);
    }
    if (fixture === 'hang') {
      return new Promise<FetchedPage>(() => {});
    }
    if (fixture instanceof Error) {
      throw fixture;
    }
    return fixture;
  }
}
