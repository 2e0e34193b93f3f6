/**
 * Shared constants for loan terms, schedule comparison and display.
 */

/** Longest schedule accepted, in months (100 years). */
export const MAX_TOTAL_PERIODS = 1200;

/** Payment columns closer than this (half a cent) are treated as equal when verifying schedules. */
export const DEFAULT_MISMATCH_TOLERANCE = 0.005;

/** Rows kept at the start of each collapsed run in a summary table. */
export const DEFAULT_SUMMARY_HEAD = 2;

/** Rows kept at the end of each collapsed run in a summary table. */
export const DEFAULT_SUMMARY_TAIL = 2;
