import { CATEGORY_KEYWORDS, type Category } from './categories.js';

/**
 * Map free text to a single category by case-insensitive substring match.
 * Total: text with no keyword hit (including the empty string) is 'general'.
 */
export function classifyProblem(text: string): Category {
  const normalized = text.toLowerCase();
  const row = CATEGORY_KEYWORDS.find(({ keywords }) =>
    keywords.some((keyword) => normalized.includes(keyword)),
  );
  return row?.category ?? 'general';
}
