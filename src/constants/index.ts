/**
 * Shared constants for the upgrade-report renderer.
 * Single source of truth for layout tunables, palette slots and file names.
 */

export const APP_NAME = 'upgrade-report';

export const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'] as const;
export const DEFAULT_CONFIG_FILE = 'config.jsonc';

/** Characters that split a version string into segments */
export const VERSION_SEPARATORS: ReadonlySet<string> = new Set(['.', '-', ':', '+', '_', '~']);

/** Weight reported when one side of a version pair is missing */
export const MAX_DIFF_WEIGHT = 9999;

export const COLUMN_LAYOUT = {
  WIDTH_DIVISOR: 2.5,
  MAX_COLUMN_WIDTH: 37,
  MIN_COLUMN_WIDTH: 8,
  MIN_PADDING: 1,
  /**
   * Assumed width of the version decorations, subtracted when padding the
   * current-version column.
   */
  DECORATION_ALLOWANCE: 18
} as const;

export const DEFAULT_TERMINAL_WIDTH = 80;
export const PARAGRAPH_INDENT = 4;

export const PALETTE = {
  BULLET: 12,
  BULLET_NEW_DEP: 11,
  BULLET_AUR: 14,
  WARNING: 11,
  AUR_ORIGIN: 9,
  REPO_ORIGIN_BASE: 10,
  REPO_ORIGIN_SPAN: 5,
  REQUIRED_BY: 3,
  PROVIDED_BY: 2,
  GROUP: 4,
  REPLACEMENTS: 14,
  INSTALLED: 14,
  RATING: 3
} as const;

/** Offset from a base color to its bright variant */
export const BRIGHT_OFFSET = 8;
