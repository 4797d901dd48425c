/**
 * Business Rules Configuration
 *
 * Centralized configuration for all business rules and limits.
 * These values can be adjusted without touching validation schemas or service logic.
 */

/**
 * Share count limits
 *
 * - MIN_SHARE_COUNT: whole shares only, at least one
 * - MAX_SHARE_COUNT: upper bound for a single holding, also after merges
 */
export const SHARE_LIMITS = {
  MIN_SHARE_COUNT: 1,

  /**
   * Maximum number of shares held for one ticker
   * Keeps products (shares × price) well inside safe integer range
   */
  MAX_SHARE_COUNT: 1_000_000,
} as const;

/**
 * Ticker format
 *
 * One to five letters, optionally followed by a share-class suffix
 * separated by "." or "-" (BRK.B, BF-B).
 */
export const TICKER_RULES = {
  PATTERN: /^[A-Z]{1,5}([.-][A-Z]{1,2})?$/,
  MAX_INPUT_LENGTH: 16,
} as const;

export const PORTFOLIO_LIMITS = {
  /**
   * Maximum distinct equities per portfolio
   */
  MAX_EQUITIES: 500,
} as const;

/**
 * Search Limits
 */
export const PAGINATION_LIMITS = {
  /**
   * Maximum results for directory search
   * Rationale: a ticker picker shows one screen of suggestions
   */
  MAX_SEARCH_RESULTS: 50,
} as const;

/**
 * Rate Limiting Configuration
 *
 * - Global limits apply to all endpoints except /health
 * - Stricter limits for mutation operations (POST, PUT, PATCH, DELETE)
 */
export const RATE_LIMITS = {
  GLOBAL: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 100,
  },

  /**
   * Portfolio and draft mutations
   */
  MUTATIONS: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 60,
  },

  /**
   * Directory search (typed-ahead by the ticker field)
   */
  SEARCH: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 60,
  },
} as const;

/**
 * Cache & TTL Configuration
 */
export const TTL_CONFIG = {
  /**
   * How long an untouched add-equity draft survives (30 minutes)
   * Every change to the draft extends it
   */
  DRAFT_TTL_SECONDS: 1_800,
} as const;

/**
 * Database Query Configuration
 */
export const DB_QUERY_LIMITS = {
  STATEMENT_TIMEOUT_MS: 10_000,
  SLOW_QUERY_THRESHOLD_MS: 1_000,
} as const;
