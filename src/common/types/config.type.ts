/**
 * AppConfig
 *
 * Single source of truth for every configuration key used in the application.
 * Each field maps 1-to-1 to a key returned by configuration.ts and consumed
 * via ConfigService.get<T>('section.key').
 *
 * Keep in sync with:
 *  - src/config/configuration.ts   (the factory)
 *  - .env.example                  (the env reference)
 */

export type AppConfig = {
  // ─── Application ───────────────────────────────────────────────────────────
  app: {
    /** Human-readable application name. Used in emails and logs. */
    name: string;
    /** HTTP port the server listens on. */
    port: number;
    /** Runtime environment: 'development' | 'staging' | 'production' */
    env: string;
  };

  // ─── Internationalisation ──────────────────────────────────────────────────
  i18n: {
    /** BCP-47 language tag used when no match is found, e.g. 'en'. */
    defaultLanguage: string;
  };

  // ─── Database ──────────────────────────────────────────────────────────────
  database: {
    /** Full PostgreSQL connection string. */
    url: string;
    /** Let TypeORM create/alter tables on boot. Never enable in production. */
    synchronize: boolean;
    /** Log every SQL statement. */
    logging: boolean;
  };

  // ─── JWT ───────────────────────────────────────────────────────────────────
  jwt: {
    /** Signing secret shared by access and refresh tokens. */
    secret: string;
    /** Access token lifetime, e.g. '15m'. */
    expiresIn: string;
    /** Refresh token lifetime, e.g. '7d'. */
    refreshExpiresIn: string;
  };

  // ─── Account security ──────────────────────────────────────────────────────
  auth: {
    /** Consecutive wrong passwords that lock an account. Default: 5. */
    maxFailedLoginAttempts: number;
  };

  // ─── Pagination ────────────────────────────────────────────────────────────
  pagination: {
    /** Page size used when `page_size` is omitted. Default: 10. */
    defaultPageSize: number;
    /** Upper bound applied to numeric `page_size` values. Default: 100. */
    maxPageSize: number;
  };

  // ─── Catalogue filters ─────────────────────────────────────────────────────
  catalog: {
    /** Optional extra bounds for `year_range`, on top of 0..current year. */
    yearRange: {
      min: number | null;
      max: number | null;
    };
    /** Bounds for `rating_range`. */
    ratingRange: {
      min: number;
      max: number;
    };
  };

  // ─── External metadata provider ────────────────────────────────────────────
  tmdb: {
    /** TMDB v3 API key. Empty disables the provider. */
    apiKey: string;
    /** e.g. 'https://api.themoviedb.org/3' */
    baseUrl: string;
    /** Prefix for poster paths, e.g. 'https://image.tmdb.org/t/p/w500' */
    imageBaseUrl: string;
    /** Pull provider genres into the local table on application bootstrap. */
    syncGenresOnStartup: boolean;
    /** Seconds a provider response stays cached. Default: 3600. */
    cacheTtl: number;
  };

  // ─── Google sign-in ────────────────────────────────────────────────────────
  google: {
    /** OAuth client id the ID token audience must match. */
    clientId: string;
  };

  // ─── CORS ──────────────────────────────────────────────────────────────────
  cors: {
    /** Allowed origin(s) for cross-origin requests, comma-separated. */
    origin: string;
  };

  // ─── Mail ──────────────────────────────────────────────────────────────────
  mail: {
    /** SMTP host, e.g. 'smtp.gmail.com'. */
    host: string;
    /** SMTP port: 465 (SSL) or 587 (STARTTLS). */
    port: number;
    /** SMTP authentication username / email. */
    user: string;
    /** SMTP authentication password or app-password. */
    password: string;
    /**
     * RFC-5321 From address shown to recipients.
     * e.g. '"My App" <no-reply@myapp.com>'
     */
    from: string;
  };

  // ─── Frontend ──────────────────────────────────────────────────────────────
  frontend: {
    /**
     * Base URL of the frontend application.
     * Used to build the validation links sent in emails.
     */
    url: string;
  };

  // ─── Cache ─────────────────────────────────────────────────────────────────
  cache: {
    /** Default TTL in seconds for cache entries. Default: 300. */
    ttl: number;
    /** Maximum number of items held in the in-memory LRU cache. Default: 500. */
    max: number;
    redis: {
      /**
       * Set to true to use Redis as the primary cache.
       * When false (or Redis is unreachable) the app falls back to in-memory cache.
       */
      enabled: boolean;
      /**
       * Full Redis connection URL.
       * e.g. 'redis://localhost:6379'
       * Null disables Redis even if `enabled` is true.
       */
      url: string | null;
    };
  };
};
