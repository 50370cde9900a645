/**
 * Document parsing and normalization
 *
 * Rules only ever see the normalized tree: scripts, styles, noscript blocks
 * and comments are gone, so keyword hits inside inline JS or commented-out
 * markup cannot produce candidates.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isComment, type AnyNode } from 'domhandler';

export const NON_CONTENT_SELECTOR = 'script, style, noscript';
export const NO_TITLE = 'No title';

export function parseDocument(html: string): CheerioAPI {
  return cheerio.load(html);
}

/**
 * Strips non-content subtrees and comment nodes in place.
 * Remaining nodes keep their attributes and sibling order.
 */
export function normalizeDocument($: CheerioAPI): CheerioAPI {
  $(NON_CONTENT_SELECTOR).remove();

  const comments: AnyNode[] = [];
  collectComments($.root().toArray(), comments);
  for (const comment of comments) {
    $(comment).remove();
  }

  return $;
}

function collectComments(nodes: readonly AnyNode[], out: AnyNode[]): void {
  for (const node of nodes) {
    if (isComment(node)) {
      out.push(node);
    } else if (hasChildren(node)) {
      collectComments(node.children, out);
    }
  }
}

export function extractTitle($: CheerioAPI): string {
  const title = $('title').first();
  if (title.length === 0) {
    return NO_TITLE;
  }
  return title.text().trim();
}
