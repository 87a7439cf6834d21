/**
 * categories.ts — Keyword-based category inference
 *
 * Rules are evaluated top to bottom and the first rule with a keyword
 * contained in the lower-cased title wins, so declaration order is the
 * tie-break. More specific categories sit above general ones.
 */
import { FALLBACK_CATEGORY } from '../types.ts';
import type { Category, CategoryRule } from '../types.ts';

export const CATEGORY_RULES: readonly CategoryRule[] = Object.freeze([
  { category: 'Scripts & Screenplays', keywords: ['script', 'screenplay'] },
  { category: 'Cameras & Camcorders', keywords: ['camera', 'camcorder'] },
  { category: 'Lighting Equipment', keywords: ['light', 'lighting'] },
  { category: 'Books & Reference', keywords: ['book', 'volume', 'reference'] },
  { category: 'Posters & Prints', keywords: ['poster', 'signed poster'] },
  { category: 'Furniture', keywords: ['sofa', 'chair', 'table', 'furniture'] },
  { category: 'Coffee & Kitchen', keywords: ['mug', 'cup', 'coffee maker', 'espresso'] },
  { category: 'Instruments & Audio', keywords: ['guitar', 'bass', 'keyboard', 'drum', 'microphone', 'audio', 'speaker'] },
  { category: 'Records & Music', keywords: ['record', 'album', 'vinyl'] },
  { category: 'Props & Memorabilia', keywords: ['prop', 'memorabilia', 'production slate'] },
] satisfies CategoryRule[]);

/** Infer a category from title text. Total: always returns a category. */
export function detectCategory(title: string, rules: readonly CategoryRule[] = CATEGORY_RULES): Category {
  const t = title.toLowerCase();
  for (const rule of rules) {
    if (rule.keywords.some(k => t.includes(k.toLowerCase()))) return rule.category;
  }
  return FALLBACK_CATEGORY;
}

/** Declaration position of a category, used to order ties in breakdowns */
export function categoryRank(category: Category, rules: readonly CategoryRule[] = CATEGORY_RULES): number {
  const i = rules.findIndex(r => r.category === category);
  return i === -1 ? rules.length : i;
}
