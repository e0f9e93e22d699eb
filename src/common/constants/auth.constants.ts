export const AUTH_CONSTANTS = {
  /** A validation token is accepted for this long after it is issued. */
  VALIDATION_TOKEN_TTL_MS: 3 * 60 * 1000,
  VALIDATION_TOKEN_BYTES: 24,

  DEFAULT_MAX_FAILED_LOGIN_ATTEMPTS: 5,
  LOCKOUT_DURATION_MS: 30 * 60 * 1000, // 30 minutes

  PASSWORD_MIN_LENGTH: 8,
  PASSWORD_MAX_LENGTH: 128,
};

export const CACHE_KEYS = {
  TMDB_SEARCH: (movieOrTv: string, term: string): string =>
    `tmdb:search:${movieOrTv}:${term.toLowerCase()}`,
  TMDB_GENRES: 'tmdb:genres',
};
