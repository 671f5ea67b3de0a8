import { Command } from 'commander';

import { CommandResult } from '../types/index.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';
import { readJsonOrJsoncFile } from '../utils/fs.js';
import { parseInstalledVersions, parseSearchRecords } from '../utils/input-records.js';
import { createCliRenderContext } from '../cli/context.js';
import { renderSearchResults } from '../core/search/search-results.js';
import { resolveOutput } from '../core/ports/resolve.js';

interface SearchOptions {
  installed?: string;
  quiet?: boolean;
  enumerate?: boolean;
  from?: string;
  color?: boolean;
}

function parseEnumerateFrom(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || String(parsed) !== value.trim()) {
    throw new ValidationError(`--from must be an integer, got '${value}'`);
  }
  return parsed;
}

async function searchCommand(
  resultsPath: string,
  options: SearchOptions,
  command: Command
): Promise<CommandResult<number>> {
  const ctx = await createCliRenderContext(command);
  const records = parseSearchRecords(await readJsonOrJsoncFile(resultsPath));
  const installed = options.installed
    ? parseInstalledVersions(await readJsonOrJsoncFile(options.installed))
    : new Map<string, string>();

  const out = resolveOutput(ctx);
  const lines = renderSearchResults(
    records,
    installed,
    {
      quiet: options.quiet,
      enumerated: options.enumerate,
      enumerateFrom: parseEnumerateFrom(options.from),
      color: options.color === false ? false : undefined
    },
    ctx
  );
  for (const line of lines) {
    out.info(line);
  }

  return { success: true, data: records.length };
}

export function setupSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Render repository and AUR search results by relevance')
    .argument('<results>', 'JSON/JSONC file with an array of search records')
    .option('-i, --installed <file>', 'JSON/JSONC file mapping installed package names to versions')
    .option('-q, --quiet', 'print package names only')
    .option('-e, --enumerate', 'number the results')
    .option('--from <n>', 'number given to the first result (default: 1)')
    .option('--no-color', 'disable colored output')
    .action(withErrorHandling(async (resultsPath: string, options: SearchOptions, command: Command) => {
      await searchCommand(resultsPath, options, command);
    }));
}
