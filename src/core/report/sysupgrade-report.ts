/**
 * Sysupgrade Report Builder
 *
 * Composes the per-category update lists into one headered report:
 *
 *   :: Repository packages will be installed:
 *    foo        1.2.3 -> 1.3.0
 *    bar        0.9   -> 1.0
 *
 *   :: AUR package will be installed:
 *    baz-git    r10   -> r12 (3 days old)
 */

import type { Category, CategoryName, ColorIndex, UpgradePlan } from '../../types/index.js';
import { CATEGORY_ORDER } from '../../types/index.js';
import { PALETTE } from '../../constants/index.js';
import { selectTextStyle } from '../../utils/text-style.js';
import { logger } from '../../utils/logger.js';
import { resolveTerminal, resolveTranslator } from '../ports/resolve.js';
import type { RenderContext } from '../render-context.js';
import { createUpgradeLineStyle } from './upgrade-line.js';
import { renderUpgradeSet } from './upgrade-set.js';

type RepoPrefixPolicy = 'config' | 'always' | 'never';

interface CategoryPresentation {
  singular: string;
  plural: string;
  bulletColor: ColorIndex;
  repoPrefix: RepoPrefixPolicy;
  newDependencies: boolean;
}

export const CATEGORY_PRESENTATION: Readonly<Record<CategoryName, CategoryPresentation>> = {
  'repo-replacement': {
    singular: 'Repository package suggested as a replacement:',
    plural: 'Repository packages suggested as a replacement:',
    bulletColor: PALETTE.BULLET,
    repoPrefix: 'config',
    newDependencies: false
  },
  'thirdparty-replacement': {
    singular: 'Third-party repository package suggested as a replacement:',
    plural: 'Third-party repository packages suggested as a replacement:',
    bulletColor: PALETTE.BULLET,
    repoPrefix: 'config',
    newDependencies: false
  },
  'repo-update': {
    singular: 'Repository package will be installed:',
    plural: 'Repository packages will be installed:',
    bulletColor: PALETTE.BULLET,
    repoPrefix: 'config',
    newDependencies: false
  },
  'repo-new-dep': {
    singular: 'New dependency will be installed from repository:',
    plural: 'New dependencies will be installed from repository:',
    bulletColor: PALETTE.BULLET_NEW_DEP,
    repoPrefix: 'config',
    newDependencies: true
  },
  'thirdparty-update': {
    singular: 'Third-party repository package will be installed:',
    plural: 'Third-party repository packages will be installed:',
    bulletColor: PALETTE.BULLET,
    repoPrefix: 'always',
    newDependencies: false
  },
  'thirdparty-new-dep': {
    singular: 'New dependency will be installed from third-party repository:',
    plural: 'New dependencies will be installed from third-party repository:',
    bulletColor: PALETTE.BULLET_NEW_DEP,
    repoPrefix: 'config',
    newDependencies: true
  },
  'aur-update': {
    singular: 'AUR package will be installed:',
    plural: 'AUR packages will be installed:',
    bulletColor: PALETTE.BULLET_AUR,
    repoPrefix: 'never',
    newDependencies: false
  },
  'aur-new-dep': {
    singular: 'New dependency will be installed from AUR:',
    plural: 'New dependencies will be installed from AUR:',
    bulletColor: PALETTE.BULLET_NEW_DEP,
    repoPrefix: 'never',
    newDependencies: true
  }
};

export interface SysupgradeReportOptions {
  /** The user picks packages by hand: no color, no auto-resolved dependencies */
  manualSelection?: boolean;
  verbose?: boolean;
  /** Overrides the terminal's color support */
  color?: boolean;
}

/**
 * Turn a resolved upgrade plan into categories in report order.
 */
export function groupCategories(plan: UpgradePlan): Category[] {
  return CATEGORY_ORDER.map(name => ({ name, packages: plan[name] ?? [] }));
}

function categoryRank(name: CategoryName): number {
  return CATEGORY_ORDER.indexOf(name);
}

function resolveShowRepo(policy: RepoPrefixPolicy, alwaysShowPkgOrigin: boolean): boolean {
  switch (policy) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'config':
      return alwaysShowPkgOrigin;
  }
}

export function buildSysupgradeReport(
  categories: readonly Category[],
  options: SysupgradeReportOptions,
  ctx: RenderContext
): string {
  const manualSelection = options.manualSelection ?? false;
  const color = !manualSelection && (options.color ?? resolveTerminal(ctx).supportsColor());
  const textStyle = selectTextStyle(color);
  const translator = resolveTranslator(ctx);

  const ordered = [...categories].sort((a, b) => categoryRank(a.name) - categoryRank(b.name));
  const result: string[] = [];

  for (const category of ordered) {
    const presentation = CATEGORY_PRESENTATION[category.name];
    if (category.packages.length === 0) {
      continue;
    }
    if (manualSelection && presentation.newDependencies) {
      logger.debug(`Omitting ${category.name} from manual selection report`);
      continue;
    }

    const label = translator.pluralize(presentation.singular, presentation.plural, category.packages.length);
    result.push(`\n${textStyle.decorate('::', presentation.bulletColor)} ${textStyle.bold(label)}`);

    const style = createUpgradeLineStyle(ctx, {
      color,
      showRepo: resolveShowRepo(presentation.repoPrefix, ctx.config.alwaysShowPkgOrigin),
      verbose: options.verbose,
      commentReplacements: manualSelection
    });
    result.push(renderUpgradeSet(category.packages, style, translator));
  }

  result.push('');
  return result.join('\n');
}
