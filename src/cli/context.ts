/**
 * CLI Context Factory
 *
 * Creates RenderContext instances for command handlers: the config is read
 * from disk on every command, ports come from the running process.
 */

import type { Command } from 'commander';
import type { RenderContext } from '../core/render-context.js';
import { ConfigManager } from '../core/config.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { processTerminal } from '../core/ports/terminal.js';
import { englishTranslator } from '../core/ports/i18n.js';

export interface GlobalOptions {
  config?: string;
}

/**
 * Options registered on the root program, reachable from any subcommand
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const root = command.parent ?? command;
  const opts = root.opts();
  return { config: typeof opts.config === 'string' ? opts.config : undefined };
}

export async function createCliRenderContext(command: Command): Promise<RenderContext> {
  const { config } = getGlobalOptions(command);
  const manager = new ConfigManager({ configFile: config });

  return {
    config: await manager.loadRenderConfig(),
    terminal: processTerminal,
    translator: englishTranslator,
    output: consoleOutput
  };
}
