import type { Element } from 'domhandler';

export const INSPECTED_ATTRIBUTES = [
  'id',
  'class',
  'name',
  'action',
  'aria-label',
  'placeholder',
  'data-testid',
  'role',
  'for',
  'type',
] as const;

export type InspectedAttribute = (typeof INSPECTED_ATTRIBUTES)[number];

/**
 * Attribute value with the empty string standing in for "absent".
 * A class list is already a single space-separated string in the parsed tree.
 */
export function attributeOf(element: Element, name: string): string {
  return element.attribs[name] ?? '';
}

/**
 * True iff one of the inspected attributes contains one of the keywords,
 * compared case-insensitively as substrings.
 */
export function matchesAttributes(element: Element, keywords: readonly string[]): boolean {
  const needles = keywords.map((keyword) => keyword.toLowerCase());

  return INSPECTED_ATTRIBUTES.some((name) => {
    const value = attributeOf(element, name).toLowerCase();
    return value.length > 0 && needles.some((needle) => value.includes(needle));
  });
}
