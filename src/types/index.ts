// Core types for the upgrade-report renderer

// ---------------------------------------------------------------------------
// Package records
// ---------------------------------------------------------------------------

export interface RequiredByEntry {
  packageName: string;
}

export interface ProvidedByEntry {
  name: string;
}

/**
 * One package's pending version change plus its relational metadata.
 * An absent `repository` means the package comes from the AUR.
 */
export interface InstallInfo {
  name: string;
  currentVersion?: string;
  newVersion?: string;
  repository?: string;
  requiredBy: readonly RequiredByEntry[];
  providedBy: readonly ProvidedByEntry[];
  memberOf: readonly string[];
  replaces: readonly string[];
  description?: string;
  develPkgAgeDays?: number;
}

export type Origin =
  | { kind: 'repo'; repository: string }
  | { kind: 'aur' };

export function originOf(info: { repository?: string }): Origin {
  return info.repository
    ? { kind: 'repo', repository: info.repository }
    : { kind: 'aur' };
}

/**
 * A search hit, either from a sync repository or from the AUR.
 * Vote and popularity metrics only exist for AUR records.
 */
export interface SearchRecord {
  name: string;
  version: string;
  description: string;
  origin: Origin;
  groups: readonly string[];
  numVotes?: number;
  popularity?: number;
  /** Unix timestamp (seconds) of the out-of-date flag */
  outOfDate?: number;
}

// ---------------------------------------------------------------------------
// Sysupgrade categories
// ---------------------------------------------------------------------------

export const CATEGORY_ORDER = [
  'repo-replacement',
  'thirdparty-replacement',
  'repo-update',
  'repo-new-dep',
  'thirdparty-update',
  'thirdparty-new-dep',
  'aur-update',
  'aur-new-dep'
] as const;

export type CategoryName = typeof CATEGORY_ORDER[number];

export interface Category {
  name: CategoryName;
  packages: readonly InstallInfo[];
}

/** Resolved upgrade data as handed over by the dependency resolver */
export type UpgradePlan = Partial<Record<CategoryName, readonly InstallInfo[]>>;

// ---------------------------------------------------------------------------
// Rendering configuration
// ---------------------------------------------------------------------------

export type SortMode = 'diff-weight' | 'name' | 'repo';

/** Value of `sync.upgradeSorting` in the config file */
export type UpgradeSorting = 'versiondiff' | 'pkgname' | 'repo';

/** Terminal color index, 0-7 normal and 8-15 bright */
export type ColorIndex = number;

export interface VersionColors {
  version: ColorIndex;
  versionDiffOld: ColorIndex;
  versionDiffNew: ColorIndex;
}

export interface UpgradeReportConfig {
  sync: {
    upgradeSorting: UpgradeSorting;
    alwaysShowPkgOrigin: boolean;
  };
  colors: VersionColors;
}

/**
 * Snapshot of the knobs a single render call consumes.
 * Built from the config file each time a command runs.
 */
export interface RenderConfig {
  readonly sortMode: SortMode;
  readonly alwaysShowPkgOrigin: boolean;
  readonly colors: Readonly<VersionColors>;
}

// ---------------------------------------------------------------------------
// Commands and errors
// ---------------------------------------------------------------------------

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

export class UpgradeReportError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'UpgradeReportError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
