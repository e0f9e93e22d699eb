import { SortDirection } from './title-filters';

/**
 * Relevance of `name` to `term`, both compared lowercased:
 *
 *   exact match  +2
 *   prefix       +2
 *   substring    +1
 *   suffix       +1
 *
 * The signals are additive, so an exact match scores 6 and no match 0.
 */
export const bestMatchScore = (name: string, term: string): number => {
  const haystack = name.toLowerCase();
  const needle = term.toLowerCase();

  let score = 0;
  if (haystack === needle) score += 2;
  if (haystack.startsWith(needle)) score += 2;
  if (haystack.includes(needle)) score += 1;
  if (haystack.endsWith(needle)) score += 1;

  return score;
};

/**
 * Orders `items` by best-match score. Equal scores keep their incoming
 * order (Array.prototype.sort is stable), so callers pass items already
 * sorted by the tie-break key.
 */
export const rankByBestMatch = <T extends { title: string }>(
  items: readonly T[],
  term: string,
  direction: SortDirection,
): T[] => {
  const sign = direction === 'DESC' ? -1 : 1;

  return items
    .map((item) => ({ item, score: bestMatchScore(item.title, term) }))
    .sort((a, b) => sign * (a.score - b.score))
    .map(({ item }) => item);
};
