/**
 * Authentication Detection Service
 *
 * Architecture Overview:
 * ┌─────────────────────────────────────────────────────────────┐
 * │ 1. Normalize                                                │
 * │    - Parse HTML, drop script/style/noscript and comments    │
 * └─────────────────────────────────────────────────────────────┘
 * ┌─────────────────────────────────────────────────────────────┐
 * │ 2. Rule Engine                                              │
 * │    - Five ordered structural/lexical rules                  │
 * └─────────────────────────────────────────────────────────────┘
 * ┌─────────────────────────────────────────────────────────────┐
 * │ 3. Aggregate                                                │
 * │    - Truncate, dedup (first wins), summarize                │
 * └─────────────────────────────────────────────────────────────┘
 *
 * Detection is synchronous and holds no state between calls, so the same
 * HTML always produces the same result.
 */

import type { CheerioAPI } from 'cheerio';
import { aggregate } from './aggregator';
import { normalizeDocument, parseDocument } from './normalizer';
import { DEFAULT_KEYWORDS, RULES, runRules, type DetectionRule } from './rules';
import type { DetectionKeywords, DetectionResult } from '@/lib/types/auth.types';

export interface DetectionOptions {
  keywords?: DetectionKeywords;
  rules?: readonly DetectionRule[];
}

/**
 * Runs detection over an already parsed document.
 * The document is normalized in place.
 */
export function detectInDocument($: CheerioAPI, options: DetectionOptions = {}): DetectionResult {
  normalizeDocument($);
  const candidates = runRules(
    { $, keywords: options.keywords ?? DEFAULT_KEYWORDS },
    options.rules ?? RULES
  );
  return aggregate(candidates);
}

export function detectAuthComponents(html: string, options: DetectionOptions = {}): DetectionResult {
  return detectInDocument(parseDocument(html), options);
}
