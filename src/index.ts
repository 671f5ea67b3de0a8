#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

// Import command setup functions
import { setupSysupgradeCommand } from './commands/sysupgrade.js';
import { setupSearchCommand } from './commands/search.js';
import { setupNoticeCommands } from './commands/notices.js';
import { setupConfigureCommand } from './commands/configure.js';
import { setupVersionCommand } from './commands/version.js';

/**
 * upgrade-report CLI - Main entry point
 *
 * Renders upgrade reports, search results and notices from records
 * produced by a package resolver.
 */

// Create the main program
const program = new Command();

program
  .name('upreport')
  .description('Render package upgrade reports and search results')
  .version(getVersion())
  .option('--config <file>', 'use this config file instead of ~/.config/upgrade-report/config.jsonc')
  .configureHelp({
    sortSubcommands: true
  });

// === REPORTS ===
setupSysupgradeCommand(program);
setupSearchCommand(program);

// === NOTICES ===
setupNoticeCommands(program);

// === SETUP ===
setupConfigureCommand(program);
setupVersionCommand(program);

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Set UPREPORT_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Set UPREPORT_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  try {
    // No arguments: show help and exit successfully
    if (argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    await program.parseAsync(argv);
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('upreport')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
