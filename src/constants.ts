/**
 * Shared constants used across the codebase.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Identifiers
// ─────────────────────────────────────────────────────────────────────────────

/** Shortest snowflake we accept as an identifier. */
export const MIN_SNOWFLAKE_LENGTH = 17;

/** Longest snowflake we accept as an identifier. */
export const MAX_SNOWFLAKE_LENGTH = 20;

/** Separator between server and channel in a target string. */
export const SCOPE_SEPARATOR = '/';

// ─────────────────────────────────────────────────────────────────────────────
// Pagination Defaults
// ─────────────────────────────────────────────────────────────────────────────

/** Default number of messages returned by read_messages. */
export const DEFAULT_READ_LIMIT = 50;

/** Maximum number of messages returned by read_messages. */
export const MAX_READ_LIMIT = 100;

/** Default number of messages scanned by search_messages. */
export const DEFAULT_SEARCH_LIMIT = 100;

/** Maximum number of messages scanned by search_messages. */
export const MAX_SEARCH_LIMIT = 500;

/** Discord returns at most this many messages per history request. */
export const HISTORY_PAGE_SIZE = 100;

// ─────────────────────────────────────────────────────────────────────────────
// Channel Listing
// ─────────────────────────────────────────────────────────────────────────────

/** Channel kinds shown by list_channels. */
export const LISTED_CHANNEL_KINDS = ['text', 'voice', 'forum'] as const;
