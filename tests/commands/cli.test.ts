import { describe, it, before, after, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { program } from '../../src/index.js';
import { DEFAULT_CONFIG } from '../../src/core/config.js';
import { getVersion } from '../../src/utils/package.js';

const spaces = (count: number): string => ' '.repeat(count);

describe('upreport CLI', () => {
  let dir: string;
  let configPath: string;

  before(async () => {
    process.env.COLUMNS = '80';
    process.env.NO_COLOR = '1';
    dir = await mkdtemp(join(tmpdir(), 'upreport-cli-'));
    configPath = join(dir, 'config.jsonc');
    await writeFile(configPath, '{}');
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it('registers every command', () => {
    const names = program.commands.map(command => command.name()).sort();
    assert.deepEqual(names, ['configure', 'ignore', 'not-found', 'search', 'sysupgrade', 'up-to-date', 'version']);
  });

  it('prints the sysupgrade report for a plan file', async () => {
    const planPath = join(dir, 'plan.json');
    await writeFile(
      planPath,
      JSON.stringify({
        'repo-update': [{ name: 'foo', currentVersion: '1.2.3', newVersion: '1.3.0', repository: 'core' }]
      })
    );
    const log = mock.method(console, 'log', () => undefined);

    await program.parseAsync(['node', 'upreport', '--config', configPath, 'sysupgrade', planPath, '--no-color']);

    assert.equal(log.mock.callCount(), 1);
    assert.deepEqual(log.mock.calls[0]?.arguments, [
      `\n:: Repository package will be installed:\n foo${spaces(29)} 1.2.3${spaces(10)} -> 1.3.0\n`
    ]);
  });

  it('prints the up-to-date notice to stderr', async () => {
    const log = mock.method(console, 'log', () => undefined);
    const error = mock.method(console, 'error', () => undefined);

    await program.parseAsync(['node', 'upreport', '--config', configPath, 'up-to-date', 'bash', '5.2']);

    assert.equal(log.mock.callCount(), 0);
    assert.deepEqual(error.mock.calls[0]?.arguments, [':: warning: bash 5.2 repo package is up to date - skipping']);
  });

  it('writes the default config only when asked to', async () => {
    const freshPath = join(dir, 'fresh.jsonc');
    const log = mock.method(console, 'log', () => undefined);

    await program.parseAsync(['node', 'upreport', '--config', freshPath, 'configure']);

    assert.deepEqual(log.mock.calls[0]?.arguments, [`Wrote default configuration to ${freshPath}`]);
    const written: unknown = JSON.parse(await readFile(freshPath, 'utf8'));
    assert.deepEqual(written, DEFAULT_CONFIG);
  });

  it('prints the quiet version lines', async () => {
    const log = mock.method(console, 'log', () => undefined);

    await program.parseAsync([
      'node', 'upreport', '--config', configPath, 'version', '--quiet', '--backend', 'Pacman v6.1.0'
    ]);

    assert.deepEqual(
      log.mock.calls.map(call => call.arguments),
      [[`upgrade-report v${getVersion()}`], ['Pacman v6.1.0']]
    );
  });
});
