/**
 * Upgrade Set Formatter
 *
 * Renders a list of updates, ordered by the sort key each line carries.
 */

import type { InstallInfo } from '../../types/index.js';
import { englishTranslator, type Translator } from '../ports/i18n.js';
import { renderUpgradeLine, type RenderedUpgradeLine, type UpgradeLineStyle } from './upgrade-line.js';

function compareSortKeys(a: RenderedUpgradeLine, b: RenderedUpgradeLine): number {
  if (a.sortKey < b.sortKey) return -1;
  if (a.sortKey > b.sortKey) return 1;
  return 0;
}

/**
 * Stable ascending sort by sort key; ties keep input order.
 */
export function sortUpgradeLines(lines: readonly RenderedUpgradeLine[]): RenderedUpgradeLine[] {
  return [...lines].sort(compareSortKeys);
}

export function renderUpgradeSet(
  records: readonly InstallInfo[],
  style: UpgradeLineStyle,
  translator: Translator = englishTranslator
): string {
  const rendered = records.map(record => renderUpgradeLine(record, style, translator));
  return sortUpgradeLines(rendered)
    .map(({ line }) => line)
    .join('\n');
}
