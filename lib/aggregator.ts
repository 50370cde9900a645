/**
 * Candidate deduplication and result assembly
 */

import {
  COMPONENT_LABELS,
  type Candidate,
  type ComponentKind,
  type DetectedComponent,
  type DetectionResult,
} from '@/lib/types/auth.types';

export const SNIPPET = {
  MAX_LENGTH: 3000,
  TRUNCATION_MARKER: '\n<!-- ... truncated ... -->',
  DEDUP_PREFIX: 200,
} as const;

export const NOTHING_FOUND_SUMMARY = 'No authentication components detected on this page.';

export function truncateSnippet(markup: string): string {
  if (markup.length <= SNIPPET.MAX_LENGTH) {
    return markup;
  }
  return markup.slice(0, SNIPPET.MAX_LENGTH) + SNIPPET.TRUNCATION_MARKER;
}

/**
 * Dedup key: the first 200 characters of the truncated snippet.
 *
 * Two different components that share a long common prefix (nested
 * containers, for instance) collapse into one entry. That is a known
 * false-negative source and is kept as-is.
 */
export function dedupKey(snippet: string): string {
  return snippet.slice(0, SNIPPET.DEDUP_PREFIX);
}

export function summarize(components: readonly DetectedComponent[]): string {
  if (components.length === 0) {
    return NOTHING_FOUND_SUMMARY;
  }

  const kinds = new Set<ComponentKind>(components.map((c) => c.kind));
  const labels = [...kinds].map((kind) => COMPONENT_LABELS[kind]);
  return `Found ${components.length} auth component(s): ${labels.join(', ')}`;
}

/**
 * Builds the final result from candidates in rule order.
 * The first candidate for a key wins; later ones are dropped, not merged.
 */
export function aggregate(candidates: readonly Candidate[]): DetectionResult {
  const seen = new Set<string>();
  const components: DetectedComponent[] = [];

  for (const { kind, markup, context } of candidates) {
    const snippet = truncateSnippet(markup);
    const key = dedupKey(snippet);
    if (seen.has(key)) continue;

    seen.add(key);
    components.push({ kind, snippet, context });
  }

  return {
    found: components.length > 0,
    components,
    summary: summarize(components),
    totalFound: components.length,
  };
}
