/**
 * Search Result Renderer
 *
 * Lists search hits from sync repositories and the AUR, most relevant
 * first, marking what is already installed:
 *
 *   1) aur/foo-git 1.3.0 [installed: 1.2.3] (10, 2.00)
 *       A foo tool
 */

import type { Origin, SearchRecord } from '../../types/index.js';
import { PALETTE } from '../../constants/index.js';
import { formatAurPrefix, formatRepoPrefix, selectTextStyle, type TextStyle } from '../../utils/text-style.js';
import { fillTemplate, formatParagraph } from '../../utils/text-layout.js';
import type { Translator } from '../ports/i18n.js';
import { resolveTerminal, resolveTranslator } from '../ports/resolve.js';
import type { RenderContext } from '../render-context.js';

export interface SearchRenderOptions {
  /** Print bare names only */
  quiet?: boolean;
  /** Prefix each result with its position */
  enumerated?: boolean;
  /** Number given to the first result when enumerated */
  enumerateFrom?: number;
  /** Overrides the terminal's color support */
  color?: boolean;
}

const NEUTRAL_RELEVANCE = 1;

/**
 * Votes and popularity combined; records without both metrics (and every
 * repository record) share a neutral score.
 */
export function relevance(record: SearchRecord): number {
  if (record.origin.kind === 'aur' && record.numVotes !== undefined && record.popularity !== undefined) {
    return (record.numVotes + 1) * (record.popularity + 1);
  }
  return NEUTRAL_RELEVANCE;
}

/**
 * Most relevant first; equal scores keep their input order.
 */
export function sortByRelevance(records: readonly SearchRecord[]): SearchRecord[] {
  return records
    .map(record => ({ record, score: relevance(record) }))
    .sort((a, b) => b.score - a.score)
    .map(({ record }) => record);
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY/MM/DD` in local time
 */
export function formatOutOfDate(timestamp: number): string {
  const date = new Date(timestamp * 1000);
  return `${date.getFullYear()}/${pad2(date.getMonth() + 1)}/${pad2(date.getDate())}`;
}

function formatOrigin(origin: Origin, textStyle: TextStyle): string {
  switch (origin.kind) {
    case 'repo':
      return formatRepoPrefix(origin.repository, textStyle);
    case 'aur':
      return formatAurPrefix(textStyle);
  }
}

function formatVersion(record: SearchRecord, ctx: RenderContext, textStyle: TextStyle, translator: Translator): string {
  const { colors } = ctx.config;
  if (record.outOfDate === undefined) {
    return textStyle.decorate(record.version, colors.version);
  }
  const flagged = `${record.version} [${translator.translate('outofdate')}: ${formatOutOfDate(record.outOfDate)}]`;
  return textStyle.decorate(flagged, colors.versionDiffOld);
}

function formatGroups(record: SearchRecord, textStyle: TextStyle): string {
  if (record.groups.length === 0) {
    return '';
  }
  return textStyle.decorate(`(${record.groups.join(' ')}) `, PALETTE.GROUP);
}

function formatInstalled(
  record: SearchRecord,
  installed: ReadonlyMap<string, string>,
  textStyle: TextStyle,
  translator: Translator
): string {
  const installedVersion = installed.get(record.name);
  if (installedVersion === undefined) {
    return '';
  }
  const marker = installedVersion === record.version
    ? translator.translate('[installed]')
    : fillTemplate(translator.translate('[installed: {version}]'), { version: installedVersion });
  return textStyle.decorate(`${marker} `, PALETTE.INSTALLED);
}

function formatRating(record: SearchRecord, textStyle: TextStyle): string {
  if (record.origin.kind !== 'aur' || record.numVotes === undefined || record.popularity === undefined) {
    return '';
  }
  return textStyle.decorate(`(${record.numVotes}, ${record.popularity.toFixed(2)})`, PALETTE.RATING);
}

/**
 * Lazily yields output lines: one per record in quiet mode, otherwise a
 * summary line followed by the wrapped description.
 */
export function* renderSearchResults(
  records: readonly SearchRecord[],
  installed: ReadonlyMap<string, string>,
  options: SearchRenderOptions,
  ctx: RenderContext
): Generator<string, void, undefined> {
  const terminal = resolveTerminal(ctx);
  const translator = resolveTranslator(ctx);
  const textStyle = selectTextStyle(options.color ?? terminal.supportsColor());
  const terminalWidth = terminal.getWidth();
  const enumerateFrom = options.enumerateFrom ?? 1;

  const sorted = sortByRelevance(records);
  for (let index = 0; index < sorted.length; index++) {
    const record = sorted[index];
    if (options.quiet) {
      yield record.name;
      continue;
    }

    const position = options.enumerated ? textStyle.bold(`${index + enumerateFrom}) `) : '';
    yield [
      position,
      formatOrigin(record.origin, textStyle),
      textStyle.bold(record.name),
      ' ',
      formatVersion(record, ctx, textStyle, translator),
      ' ',
      formatGroups(record, textStyle),
      formatInstalled(record, installed, textStyle, translator),
      formatRating(record, textStyle)
    ].join('');
    yield formatParagraph(record.description, terminalWidth);
  }
}
