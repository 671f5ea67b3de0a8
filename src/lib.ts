/**
 * upgrade-report - library entry
 *
 * Renderers for upgrade reports, search results and notices, usable
 * without the CLI. All terminal and locale concerns are reached through
 * the ports of a RenderContext.
 */

// ============================================================================
// Port Interfaces
// ============================================================================

export type { OutputPort } from './core/ports/output.js';
export type { TerminalPort } from './core/ports/terminal.js';
export type { Translator } from './core/ports/i18n.js';
export { consoleOutput } from './core/ports/console-output.js';
export { processTerminal, fixedTerminal } from './core/ports/terminal.js';
export { englishTranslator } from './core/ports/i18n.js';

// ============================================================================
// Types and configuration
// ============================================================================

export * from './types/index.js';
export { createRenderContext, type RenderContext } from './core/render-context.js';
export { ConfigManager, DEFAULT_CONFIG, DEFAULT_RENDER_CONFIG, mergeConfig, toRenderConfig } from './core/config.js';
export { ansiStyle, plainStyle, selectTextStyle, type TextStyle } from './utils/text-style.js';

// ============================================================================
// Renderers
// ============================================================================

export { commonPrefix, suffix, type VersionPrefix } from './core/report/version-diff.js';
export {
  renderUpgradeLine,
  createUpgradeLineStyle,
  compileLineTemplate,
  DEFAULT_LINE_TEMPLATE,
  type UpgradeLineStyle,
  type LineTemplate,
  type RenderedUpgradeLine
} from './core/report/upgrade-line.js';
export { renderUpgradeSet } from './core/report/upgrade-set.js';
export { buildSysupgradeReport, groupCategories, type SysupgradeReportOptions } from './core/report/sysupgrade-report.js';
export { renderSearchResults, relevance, type SearchRenderOptions } from './core/search/search-results.js';
export { formatVersionBanner, type VersionBannerOptions } from './core/report/version-banner.js';
export {
  formatIgnoredPackage,
  formatNotFoundPackages,
  formatUpToDate,
  printIgnoredPackage,
  printNotFoundPackages,
  printUpToDate
} from './core/report/notices.js';

// ============================================================================
// Input parsing
// ============================================================================

export { parseUpgradePlan, parseSearchRecords, parseInstalledVersions } from './utils/input-records.js';
