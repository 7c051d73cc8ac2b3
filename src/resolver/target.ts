/**
 * Lexical parsing of target strings.
 */

import { MAX_SNOWFLAKE_LENGTH, MIN_SNOWFLAKE_LENGTH, SCOPE_SEPARATOR } from '../constants.js';

/** A raw target split into an optional server scope and the entity reference. */
export interface TargetSpec {
  /** Server name or ID used to disambiguate, when given. */
  scope?: string;
  /** Channel or user name or ID. */
  reference: string;
}

const SNOWFLAKE_PATTERN = new RegExp(`^\\d{${MIN_SNOWFLAKE_LENGTH},${MAX_SNOWFLAKE_LENGTH}}$`);

/**
 * Checks whether a string looks like a Discord snowflake ID
 * (all decimal digits, 17–20 characters).
 */
export function isIdentifier(value: string): boolean {
  return SNOWFLAKE_PATTERN.test(value);
}

/**
 * Parses a target string into scope and reference.
 *
 * - "general" → { reference: "general" }
 * - "MyServer/general" → { scope: "MyServer", reference: "general" }
 * - "123456789012345678" → { reference: "123456789012345678" }
 *
 * Only the first separator splits, so channel names after it may contain more.
 */
export function parseTarget(raw: string): TargetSpec {
  const separatorIndex = raw.indexOf(SCOPE_SEPARATOR);
  if (separatorIndex === -1 || isIdentifier(raw)) {
    return { reference: raw.trim() };
  }
  return {
    scope: raw.slice(0, separatorIndex).trim(),
    reference: raw.slice(separatorIndex + SCOPE_SEPARATOR.length).trim(),
  };
}
