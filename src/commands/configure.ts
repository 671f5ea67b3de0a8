import { Command } from 'commander';

import { CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { ConfigManager } from '../core/config.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { getGlobalOptions } from '../cli/context.js';

/**
 * Configure command: the only place the config file is created
 */

interface ConfigureOptions {
  force?: boolean;
}

export async function configureCommand(
  manager: ConfigManager,
  options: ConfigureOptions,
  out: OutputPort
): Promise<CommandResult<string>> {
  const { path, created } = await manager.init(options.force ?? false);
  out.info(created ? `Wrote default configuration to ${path}` : `Configuration already exists at ${path}`);
  return { success: true, data: path };
}

export function setupConfigureCommand(program: Command): void {
  program
    .command('configure')
    .description('Write the default configuration file')
    .option('-f, --force', 'overwrite an existing configuration file')
    .action(withErrorHandling(async (options: ConfigureOptions, command: Command) => {
      const { config } = getGlobalOptions(command);
      await configureCommand(new ConfigManager({ configFile: config }), options, consoleOutput);
    }));
}
