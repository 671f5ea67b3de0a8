import { Command } from 'commander';

import { CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { readJsonOrJsoncFile } from '../utils/fs.js';
import { parseUpgradePlan } from '../utils/input-records.js';
import { logger } from '../utils/logger.js';
import { createCliRenderContext } from '../cli/context.js';
import { buildSysupgradeReport, groupCategories } from '../core/report/sysupgrade-report.js';
import { resolveOutput } from '../core/ports/resolve.js';

interface SysupgradeOptions {
  manual?: boolean;
  verbose?: boolean;
  color?: boolean;
}

async function sysupgradeCommand(
  planPath: string,
  options: SysupgradeOptions,
  command: Command
): Promise<CommandResult<string>> {
  const ctx = await createCliRenderContext(command);
  const plan = parseUpgradePlan(await readJsonOrJsoncFile(planPath));
  const categories = groupCategories(plan);
  logger.debug(`Rendering sysupgrade report from ${planPath}`, {
    packages: categories.reduce((total, category) => total + category.packages.length, 0)
  });

  // --no-color sets color to false; otherwise let the terminal decide
  const report = buildSysupgradeReport(
    categories,
    {
      manualSelection: options.manual,
      verbose: options.verbose,
      color: options.color === false ? false : undefined
    },
    ctx
  );

  resolveOutput(ctx).info(report);
  return { success: true, data: report };
}

export function setupSysupgradeCommand(program: Command): void {
  program
    .command('sysupgrade')
    .description('Render the pending system upgrade from a resolved upgrade plan')
    .argument('<plan>', 'JSON/JSONC file mapping category names to update records')
    .option('-m, --manual', 'manual package selection: plain text, no auto-resolved dependencies')
    .option('-v, --verbose', 'show package origins and descriptions')
    .option('--no-color', 'disable colored output')
    .action(withErrorHandling(async (planPath: string, options: SysupgradeOptions, command: Command) => {
      await sysupgradeCommand(planPath, options, command);
    }));
}
