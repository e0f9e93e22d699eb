import { parseStrictInt, splitCsv } from '@/common/utils/integers';
import { MovieOrTv } from '@/database/entities';

/* ================= RESULT TYPES ================= */

export type FilterErrorKey =
  | 'catalog.errors.invalidCategory'
  | 'catalog.errors.invalidGenreIds'
  | 'catalog.errors.yearRangeFormat'
  | 'catalog.errors.yearRangeNotIntegers'
  | 'catalog.errors.yearRangeOrder'
  | 'catalog.errors.yearRangeOutOfBounds'
  | 'catalog.errors.yearRangeBetween'
  | 'catalog.errors.yearRangeBelowMin'
  | 'catalog.errors.yearRangeAboveMax'
  | 'catalog.errors.ratingRangeFormat'
  | 'catalog.errors.ratingRangeNotIntegers'
  | 'catalog.errors.ratingRangeOrder'
  | 'catalog.errors.ratingRangeBetween'
  | 'catalog.errors.invalidOrdering';

export type FilterError = {
  key: FilterErrorKey;
  args?: Record<string, string | number>;
};

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FilterError };

const ok = <T>(value: T): ParseResult<T> => ({ ok: true, value });
const fail = <T>(
  key: FilterErrorKey,
  args?: FilterError['args'],
): ParseResult<T> => ({ ok: false, error: { key, args } });

export type IntegerRange = { start: number; end: number };

export type YearBounds = { min: number | null; max: number | null };

export type RatingBounds = { min: number; max: number };

/* ================= CATEGORY ================= */

/** `all` → null (no restriction). */
export const parseCategory = (raw: string): ParseResult<MovieOrTv | null> => {
  const value = raw.trim().toLowerCase();

  if (value === 'all') return ok(null);
  if (value === MovieOrTv.MOVIE) return ok(MovieOrTv.MOVIE);
  if (value === MovieOrTv.TV) return ok(MovieOrTv.TV);

  return fail('catalog.errors.invalidCategory');
};

/* ================= GENRES ================= */

export const parseGenreIds = (raw: string): ParseResult<number[]> => {
  const ids: number[] = [];

  for (const token of splitCsv(raw)) {
    const id = parseStrictInt(token);
    if (id === null) return fail('catalog.errors.invalidGenreIds');
    ids.push(id);
  }

  return ok(ids);
};

/* ================= RANGES ================= */

const parsePair = (raw: string): string[] | null => {
  const tokens = splitCsv(raw);
  return tokens.length === 2 ? tokens : null;
};

/**
 * `"start,end"` in years. Checked in order: shape, integers, start ≤ end,
 * 0 ≤ year ≤ current year, then the configured bounds.
 */
export const parseYearRange = (
  raw: string,
  bounds: YearBounds,
  currentYear: number,
): ParseResult<IntegerRange> => {
  const tokens = parsePair(raw);
  if (!tokens) return fail('catalog.errors.yearRangeFormat');

  const start = parseStrictInt(tokens[0] ?? '');
  const end = parseStrictInt(tokens[1] ?? '');
  if (start === null || end === null) {
    return fail('catalog.errors.yearRangeNotIntegers');
  }

  if (start > end) return fail('catalog.errors.yearRangeOrder');

  if (start < 0 || end > currentYear) {
    return fail('catalog.errors.yearRangeOutOfBounds');
  }

  const belowMin = bounds.min !== null && start < bounds.min;
  const aboveMax = bounds.max !== null && end > bounds.max;

  if (bounds.min !== null && bounds.max !== null && (belowMin || aboveMax)) {
    return fail('catalog.errors.yearRangeBetween', {
      min: bounds.min,
      max: bounds.max,
    });
  }
  if (bounds.min !== null && belowMin) {
    return fail('catalog.errors.yearRangeBelowMin', { min: bounds.min });
  }
  if (bounds.max !== null && aboveMax) {
    return fail('catalog.errors.yearRangeAboveMax', { max: bounds.max });
  }

  return ok({ start, end });
};

/**
 * `"min,max"` over the rating scale.
 */
export const parseRatingRange = (
  raw: string,
  bounds: RatingBounds,
): ParseResult<IntegerRange> => {
  const tokens = parsePair(raw);
  if (!tokens) return fail('catalog.errors.ratingRangeFormat');

  const start = parseStrictInt(tokens[0] ?? '');
  const end = parseStrictInt(tokens[1] ?? '');
  if (start === null || end === null) {
    return fail('catalog.errors.ratingRangeNotIntegers');
  }

  if (start > end) return fail('catalog.errors.ratingRangeOrder');

  if (start < bounds.min || end > bounds.max) {
    return fail('catalog.errors.ratingRangeBetween', {
      min: bounds.min,
      max: bounds.max,
    });
  }

  return ok({ start, end });
};

/**
 * Inclusive ISO date bounds covering whole years. Year 0 starts at
 * 0001-01-01, the earliest date PostgreSQL accepts.
 */
export const yearRangeToDates = (
  range: IntegerRange,
): { from: string; to: string } => ({
  from: `${String(Math.max(range.start, 1)).padStart(4, '0')}-01-01`,
  to: `${String(range.end).padStart(4, '0')}-12-31`,
});

/* ================= ORDERING ================= */

export const ORDER_FIELDS = [
  'id',
  'title',
  'release_date',
  'rating',
  'movie_or_tv',
] as const;

export type OrderField = (typeof ORDER_FIELDS)[number];

export type SortDirection = 'ASC' | 'DESC';

export type Ordering =
  | { kind: 'field'; field: OrderField; direction: SortDirection }
  | { kind: 'best_match'; direction: SortDirection };

export const DEFAULT_ORDERING = '-rating';

const isOrderField = (value: string): value is OrderField =>
  ORDER_FIELDS.some((field) => field === value);

/**
 * Reads `order_by`. `best_match` only ranks when a search term is present;
 * otherwise it is treated as a field name and rejected like any other
 * unknown field.
 */
export const parseOrdering = (
  raw: string | undefined,
  hasSearchTerm: boolean,
): ParseResult<Ordering> => {
  const value = (raw?.trim() || DEFAULT_ORDERING).toLowerCase();
  const direction: SortDirection = value.startsWith('-') ? 'DESC' : 'ASC';
  const field = value.startsWith('-') ? value.slice(1) : value;

  if (field === 'best_match' && hasSearchTerm) {
    return ok({ kind: 'best_match', direction });
  }

  if (!isOrderField(field)) {
    return fail('catalog.errors.invalidOrdering', { field });
  }

  return ok({ kind: 'field', field, direction });
};
