/**
 * Upgrade Line Formatter
 *
 * Renders one package update as an aligned line:
 *
 *   ` core/foo (for bar)        1.2.3          -> 1.3.0`
 *
 * or, given a line template, as a terse single line with no column logic.
 */

import type { InstallInfo, Origin, SortMode, VersionColors } from '../../types/index.js';
import { originOf } from '../../types/index.js';
import { BRIGHT_OFFSET, COLUMN_LAYOUT, MAX_DIFF_WEIGHT, PALETTE } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { formatAurPrefix, formatRepoPrefix, selectTextStyle, type TextStyle } from '../../utils/text-style.js';
import { fillTemplate, formatParagraph, padding, visibleWidth } from '../../utils/text-layout.js';
import { englishTranslator, type Translator } from '../ports/i18n.js';
import { resolveTerminal } from '../ports/resolve.js';
import type { RenderContext } from '../render-context.js';
import { commonPrefix, suffix } from './version-diff.js';

// ---------------------------------------------------------------------------
// Line templates
// ---------------------------------------------------------------------------

export const LINE_PLACEHOLDERS = [
  'pkgName',
  'spacing',
  'currentVersion',
  'spacing2',
  'versionSeparator',
  'newVersion',
  'daysOld',
  'verbose'
] as const;

export type LinePlaceholder = typeof LINE_PLACEHOLDERS[number];

export type LinePlaceholders = Record<LinePlaceholder, string>;

/** A template whose placeholders have been checked against LINE_PLACEHOLDERS */
export interface LineTemplate {
  readonly source: string;
  readonly placeholders: readonly LinePlaceholder[];
}

const PLACEHOLDER_PATTERN = /\{(\w*)\}/g;

function isLinePlaceholder(name: string): name is LinePlaceholder {
  return LINE_PLACEHOLDERS.some(placeholder => placeholder === name);
}

export function compileLineTemplate(source: string): LineTemplate {
  const placeholders: LinePlaceholder[] = [];
  for (const match of source.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (!isLinePlaceholder(name)) {
      throw new ValidationError(`Unknown placeholder '{${name}}' in line template '${source}'`);
    }
    placeholders.push(name);
  }
  return { source, placeholders };
}

export const DEFAULT_LINE_TEMPLATE = compileLineTemplate(
  ' {pkgName}{spacing} {currentVersion}{spacing2}{versionSeparator}{newVersion}{daysOld}{verbose}'
);

function applyLineTemplate(template: LineTemplate, values: LinePlaceholders): string {
  return template.source.replace(PLACEHOLDER_PATTERN, (match, name: string) =>
    isLinePlaceholder(name) ? values[name] : match
  );
}

// ---------------------------------------------------------------------------
// Style
// ---------------------------------------------------------------------------

export interface UpgradeLineStyle {
  textStyle: TextStyle;
  showRepo: boolean;
  verbose: boolean;
  terminalWidth: number;
  sortMode: SortMode;
  colors: VersionColors;
  /** Prefix lines carrying replacements with `# ` so they read as comments */
  commentReplacements?: boolean;
  /** Terse single-line form; skips column alignment */
  template?: LineTemplate;
}

export interface UpgradeLineStyleOptions {
  color?: boolean;
  showRepo?: boolean;
  verbose?: boolean;
  commentReplacements?: boolean;
  template?: LineTemplate;
}

/**
 * Build a line style from the context. Terminal width and color support
 * are read here, once per render call.
 */
export function createUpgradeLineStyle(
  ctx: RenderContext,
  options: UpgradeLineStyleOptions = {}
): UpgradeLineStyle {
  const terminal = resolveTerminal(ctx);
  return {
    textStyle: selectTextStyle(options.color ?? terminal.supportsColor()),
    showRepo: options.showRepo ?? ctx.config.alwaysShowPkgOrigin,
    verbose: options.verbose ?? false,
    terminalWidth: terminal.getWidth(),
    sortMode: ctx.config.sortMode,
    colors: ctx.config.colors,
    commentReplacements: options.commentReplacements,
    template: options.template
  };
}

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

export function computeColumnWidth(terminalWidth: number): number {
  const scaled = Number.isFinite(terminalWidth)
    ? Math.floor(terminalWidth / COLUMN_LAYOUT.WIDTH_DIVISOR)
    : 0;
  return Math.max(COLUMN_LAYOUT.MIN_COLUMN_WIDTH, Math.min(scaled, COLUMN_LAYOUT.MAX_COLUMN_WIDTH));
}

export function buildSortKey(info: InstallInfo, weight: number, mode: SortMode): string {
  switch (mode) {
    case 'name':
      return info.name;
    case 'repo':
      return `${info.repository ?? ''}${info.name}`;
    case 'diff-weight':
      return `${String(MAX_DIFF_WEIGHT - weight).padStart(4, '0')}${info.name}`;
  }
}

// ---------------------------------------------------------------------------
// Name decorations
// ---------------------------------------------------------------------------

function formatOriginPrefix(origin: Origin, style: UpgradeLineStyle): string {
  switch (origin.kind) {
    case 'repo':
      return style.showRepo || style.verbose ? formatRepoPrefix(origin.repository, style.textStyle) : '';
    case 'aur':
      return style.showRepo ? formatAurPrefix(style.textStyle) : '';
  }
}

/**
 * ` (<template>)` where `{key}` is replaced by already-decorated text;
 * the surrounding words take `color`.
 */
function wrapAround(template: string, key: string, inner: string, color: number, textStyle: TextStyle): string {
  const marker = `{${key}}`;
  const index = template.indexOf(marker);
  const before = index === -1 ? `${template} ` : template.slice(0, index);
  const after = index === -1 ? '' : template.slice(index + marker.length);
  return textStyle.decorate(` (${before}`, color) + inner + textStyle.decorate(`${after})`, color);
}

function joinDecorated(items: readonly string[], color: number, textStyle: TextStyle): string {
  return items
    .map(item => textStyle.decorate(item, color + BRIGHT_OFFSET))
    .join(textStyle.decorate(', ', color));
}

function formatRequiredBy(info: InstallInfo, textStyle: TextStyle, translator: Translator): string {
  if (info.requiredBy.length === 0) {
    return '';
  }
  const names = joinDecorated(info.requiredBy.map(entry => entry.packageName), PALETTE.REQUIRED_BY, textStyle);
  return wrapAround(translator.translate('for {pkg}'), 'pkg', names, PALETTE.REQUIRED_BY, textStyle);
}

function formatProvidedBy(info: InstallInfo, textStyle: TextStyle): string {
  if (info.providedBy.length === 0) {
    return '';
  }
  const names = info.providedBy.map(entry => entry.name).join(' # ');
  return textStyle.decorate(` (${names})`, PALETTE.PROVIDED_BY);
}

function formatMemberOf(info: InstallInfo, textStyle: TextStyle, translator: Translator): string {
  if (info.memberOf.length === 0) {
    return '';
  }
  const groups = joinDecorated(info.memberOf, PALETTE.GROUP, textStyle);
  const template = translator.pluralize('{grp} group', '{grp} groups', info.memberOf.length);
  return wrapAround(template, 'grp', groups, PALETTE.GROUP, textStyle);
}

function formatReplaces(info: InstallInfo, textStyle: TextStyle, translator: Translator): string {
  if (info.replaces.length === 0) {
    return '';
  }
  const text = fillTemplate(translator.translate('replaces {pkgs}'), { pkgs: info.replaces.join(', ') });
  return textStyle.decorate(` (${text})`, PALETTE.REPLACEMENTS);
}

interface DisplayName {
  text: string;
  /** Visible width, escape sequences excluded */
  width: number;
}

function formatDisplayName(info: InstallInfo, style: UpgradeLineStyle, translator: Translator): DisplayName {
  const { textStyle } = style;
  const decorated =
    formatOriginPrefix(originOf(info), style) +
    textStyle.bold(info.name) +
    formatRequiredBy(info, textStyle, translator) +
    formatProvidedBy(info, textStyle) +
    formatMemberOf(info, textStyle, translator) +
    formatReplaces(info, textStyle, translator);

  const width = visibleWidth(decorated);
  const text = style.commentReplacements && info.replaces.length > 0 ? `# ${decorated}` : decorated;
  return { text, width };
}

// ---------------------------------------------------------------------------
// Line
// ---------------------------------------------------------------------------

export interface RenderedUpgradeLine {
  line: string;
  sortKey: string;
}

function formatVersion(full: string, shared: string, diffColor: number, style: UpgradeLineStyle): string {
  return style.textStyle.decorate(shared, style.colors.version) +
    style.textStyle.decorate(suffix(full, shared), diffColor);
}

export function renderUpgradeLine(
  info: InstallInfo,
  style: UpgradeLineStyle,
  translator: Translator = englishTranslator
): RenderedUpgradeLine {
  const current = info.currentVersion ?? '';
  const next = info.newVersion ?? '';
  const { shared, weight } = commonPrefix(current, next);
  const name = formatDisplayName(info, style, translator);

  const daysOld = info.develPkgAgeDays !== undefined
    ? ` ${fillTemplate(translator.translate('({days} days old)'), { days: info.develPkgAgeDays })}`
    : '';

  const verbose = style.verbose && info.description
    ? `\n${formatParagraph(info.description, style.terminalWidth)}`
    : '';

  let spacing = '';
  let spacing2 = '';
  if (!style.template) {
    const columnWidth = computeColumnWidth(style.terminalWidth);
    spacing = padding(columnWidth - name.width, COLUMN_LAYOUT.MIN_PADDING);
    spacing2 = padding(
      columnWidth - COLUMN_LAYOUT.DECORATION_ALLOWANCE - current.length - Math.max(-1, name.width - columnWidth),
      COLUMN_LAYOUT.MIN_PADDING
    );
  }

  const line = applyLineTemplate(style.template ?? DEFAULT_LINE_TEMPLATE, {
    pkgName: name.text,
    spacing,
    currentVersion: formatVersion(current, shared, style.colors.versionDiffOld, style),
    spacing2,
    versionSeparator: current || next ? ' -> ' : '',
    newVersion: formatVersion(next, shared, style.colors.versionDiffNew, style),
    daysOld,
    verbose
  });

  return { line, sortKey: buildSortKey(info, weight, style.sortMode) };
}
