import { join } from 'path';
import { homedir } from 'os';
import type { RenderConfig, SortMode, UpgradeReportConfig, UpgradeSorting, VersionColors } from '../types/index.js';
import { APP_NAME, CONFIG_FILE_NAMES, DEFAULT_CONFIG_FILE } from '../constants/index.js';
import { readJsonOrJsoncFile, writeJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { isRecord, describeValue } from '../utils/validation/guards.js';

/**
 * Configuration management for the upgrade-report CLI
 * Supports both JSON and JSONC formats
 */

const UPGRADE_SORTINGS: readonly UpgradeSorting[] = ['versiondiff', 'pkgname', 'repo'];

// Default configuration values
export const DEFAULT_CONFIG: UpgradeReportConfig = {
  sync: {
    upgradeSorting: 'versiondiff',
    alwaysShowPkgOrigin: false
  },
  colors: {
    version: 10,
    versionDiffOld: 11,
    versionDiffNew: 9
  }
};

export function toSortMode(sorting: UpgradeSorting): SortMode {
  switch (sorting) {
    case 'pkgname':
      return 'name';
    case 'repo':
      return 'repo';
    default:
      return 'diff-weight';
  }
}

export function toRenderConfig(config: UpgradeReportConfig): RenderConfig {
  return Object.freeze({
    sortMode: toSortMode(config.sync.upgradeSorting),
    alwaysShowPkgOrigin: config.sync.alwaysShowPkgOrigin,
    colors: Object.freeze({ ...config.colors })
  });
}

export const DEFAULT_RENDER_CONFIG: RenderConfig = toRenderConfig(DEFAULT_CONFIG);

/**
 * Directory holding the config file, following the XDG base directory layout
 */
export function getConfigDir(): string {
  const base = process.env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, APP_NAME);
}

function readSection(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = raw[key];
  if (section === undefined) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigError(`Config section '${key}' must be an object, got ${describeValue(section)}`);
  }
  return section;
}

function readColor(section: Record<string, unknown>, key: keyof VersionColors, fallback: number): number {
  const value = section[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 15) {
    throw new ConfigError(`colors.${key} must be an integer between 0 and 15`);
  }
  return value;
}

function isUpgradeSorting(value: unknown): value is UpgradeSorting {
  return UPGRADE_SORTINGS.some(sorting => sorting === value);
}

/**
 * Merge a parsed config file over the defaults, rejecting invalid values
 */
export function mergeConfig(raw: unknown): UpgradeReportConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid configuration structure: expected an object, got ${describeValue(raw)}`);
  }

  const sync = readSection(raw, 'sync');
  const colors = readSection(raw, 'colors');

  const upgradeSorting = sync.upgradeSorting ?? DEFAULT_CONFIG.sync.upgradeSorting;
  if (!isUpgradeSorting(upgradeSorting)) {
    throw new ConfigError(
      `sync.upgradeSorting must be one of ${UPGRADE_SORTINGS.join(', ')}, got '${String(upgradeSorting)}'`
    );
  }

  const alwaysShowPkgOrigin = sync.alwaysShowPkgOrigin ?? DEFAULT_CONFIG.sync.alwaysShowPkgOrigin;
  if (typeof alwaysShowPkgOrigin !== 'boolean') {
    throw new ConfigError('sync.alwaysShowPkgOrigin must be a boolean');
  }

  return {
    sync: { upgradeSorting, alwaysShowPkgOrigin },
    colors: {
      version: readColor(colors, 'version', DEFAULT_CONFIG.colors.version),
      versionDiffOld: readColor(colors, 'versionDiffOld', DEFAULT_CONFIG.colors.versionDiffOld),
      versionDiffNew: readColor(colors, 'versionDiffNew', DEFAULT_CONFIG.colors.versionDiffNew)
    }
  };
}

export interface ConfigManagerOptions {
  /** Directory searched for config.jsonc / config.json */
  configDir?: string;
  /** Explicit config file; takes precedence over configDir */
  configFile?: string;
}

export class ConfigManager {
  private readonly configDir: string;
  private readonly configFile?: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.configDir = options.configDir ?? getConfigDir();
    this.configFile = options.configFile;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   * Returns the path to the existing config file, or null if none exists
   */
  private async findConfigFile(): Promise<string | null> {
    if (this.configFile) {
      if (!(await exists(this.configFile))) {
        throw new ConfigError(`Config file not found: ${this.configFile}`);
      }
      return this.configFile;
    }

    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.configDir, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file; defaults when none exists. Nothing is
   * written on load, use save() to create the file.
   * Read fresh on every call; the file may change between runs.
   */
  async load(): Promise<UpgradeReportConfig> {
    const configPath = await this.findConfigFile();

    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      return DEFAULT_CONFIG;
    }

    logger.debug(`Loading config from: ${configPath}`);
    try {
      return mergeConfig(await readJsonOrJsoncFile(configPath));
    } catch (error) {
      if (error instanceof ConfigError) {
        throw error;
      }
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${configPath}`, { error });
    }
  }

  async loadRenderConfig(): Promise<RenderConfig> {
    return toRenderConfig(await this.load());
  }

  /**
   * Save configuration to the default file in the config directory
   */
  async save(config: UpgradeReportConfig): Promise<void> {
    const configPath = this.getConfigFilePath();
    logger.debug(`Saving config to: ${configPath}`);
    try {
      await writeJsoncFile(configPath, config);
    } catch (error) {
      logger.error('Failed to save configuration', { error, configPath });
      throw new ConfigError(`Failed to save configuration: ${configPath}`, { error });
    }
  }

  /**
   * Write the default config unless a file is already there (or `force`).
   */
  async init(force = false): Promise<{ path: string; created: boolean }> {
    const path = this.getConfigFilePath();
    if (!force && (await exists(path))) {
      return { path, created: false };
    }
    await this.save(DEFAULT_CONFIG);
    return { path, created: true };
  }

  getConfigFilePath(): string {
    return this.configFile ?? join(this.configDir, DEFAULT_CONFIG_FILE);
  }
}
