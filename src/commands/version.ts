import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { getVersion } from '../utils/package.js';
import { createCliRenderContext } from '../cli/context.js';
import { formatVersionBanner } from '../core/report/version-banner.js';
import { resolveOutput } from '../core/ports/resolve.js';

interface VersionOptions {
  quiet?: boolean;
  backend?: string;
  color?: boolean;
}

export function setupVersionCommand(program: Command): void {
  program
    .command('version')
    .description('Print the version banner')
    .option('-q, --quiet', 'print plain version lines only')
    .option('-b, --backend <text>', 'version line of the package manager backend')
    .option('--no-color', 'disable colored output')
    .action(withErrorHandling(async (options: VersionOptions, command: Command) => {
      const ctx = await createCliRenderContext(command);
      const out = resolveOutput(ctx);
      const lines = formatVersionBanner(
        getVersion(),
        {
          quiet: options.quiet,
          backendVersion: options.backend,
          color: options.color === false ? false : undefined
        },
        ctx
      );
      for (const line of lines) {
        out.info(line);
      }
    }));
}
