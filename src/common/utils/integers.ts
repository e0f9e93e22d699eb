const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses a base-10 integer, rejecting anything `parseInt` would quietly
 * truncate ('1.5', '12abc', '').
 */
export const parseStrictInt = (value: string): number | null => {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;

  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

/**
 * Splits a comma-separated parameter after stripping every space, so
 * '1, 2' and '1,2' read the same.
 */
export const splitCsv = (value: string): string[] =>
  value.replace(/ /g, '').split(',');
