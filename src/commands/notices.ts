import { Command } from 'commander';

import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { createCliRenderContext } from '../cli/context.js';
import {
  printIgnoredPackage,
  printNotFoundPackages,
  printUpToDate,
  type PackageSourceName
} from '../core/report/notices.js';

interface IgnoreOptions {
  current?: string;
  new?: string;
}

interface NotFoundOptions {
  repo?: boolean;
}

interface UpToDateOptions {
  source: string;
}

function parseSource(value: string): PackageSourceName {
  if (value === 'repo' || value === 'aur') {
    return value;
  }
  throw new ValidationError(`--source must be 'repo' or 'aur', got '${value}'`);
}

export function setupNoticeCommands(program: Command): void {
  program
    .command('ignore')
    .description('Print the notice for a package whose update is being ignored')
    .argument('<name>', 'package name')
    .option('--current <version>', 'installed version')
    .option('--new <version>', 'available version')
    .action(withErrorHandling(async (name: string, options: IgnoreOptions, command: Command) => {
      const ctx = await createCliRenderContext(command);
      printIgnoredPackage(name, { current: options.current, next: options.new }, ctx);
    }));

  program
    .command('not-found')
    .description('Print the warning for packages that could not be found')
    .argument('<names...>', 'package names')
    .option('-r, --repo', 'packages were looked up in repositories (default: AUR)')
    .action(withErrorHandling(async (names: string[], options: NotFoundOptions, command: Command) => {
      const ctx = await createCliRenderContext(command);
      printNotFoundPackages(names, options.repo ?? false, ctx);
    }));

  program
    .command('up-to-date')
    .description('Print the notice for a package that is already up to date')
    .argument('<name>', 'package name')
    .argument('<version>', 'installed version')
    .option('-s, --source <source>', 'repo or aur', 'repo')
    .action(withErrorHandling(async (name: string, version: string, options: UpToDateOptions, command: Command) => {
      const ctx = await createCliRenderContext(command);
      printUpToDate(name, version, parseSource(options.source), ctx);
    }));
}
