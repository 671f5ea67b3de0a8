import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigManager,
  DEFAULT_CONFIG,
  DEFAULT_RENDER_CONFIG,
  mergeConfig,
  toRenderConfig,
  toSortMode
} from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'upreport-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the defaults without writing a file when none exists', async () => {
    const manager = new ConfigManager({ configDir: dir });
    const config = await manager.load();

    assert.deepEqual(config, DEFAULT_CONFIG);
    assert.equal(manager.getConfigFilePath(), join(dir, 'config.jsonc'));
    assert.deepEqual(await readdir(dir), []);
  });

  it('writes the defaults on init', async () => {
    const manager = new ConfigManager({ configDir: dir });
    assert.deepEqual(await manager.init(), { path: join(dir, 'config.jsonc'), created: true });

    const written: unknown = JSON.parse(await readFile(join(dir, 'config.jsonc'), 'utf8'));
    assert.deepEqual(written, DEFAULT_CONFIG);
  });

  it('leaves an existing file alone on init unless forced', async () => {
    const path = join(dir, 'config.jsonc');
    await writeFile(path, '{ "sync": { "upgradeSorting": "repo" } }');
    const manager = new ConfigManager({ configDir: dir });

    assert.deepEqual(await manager.init(), { path, created: false });
    assert.equal((await manager.load()).sync.upgradeSorting, 'repo');

    assert.deepEqual(await manager.init(true), { path, created: true });
    assert.equal((await manager.load()).sync.upgradeSorting, 'versiondiff');
  });

  it('reads JSONC with comments and trailing commas', async () => {
    await writeFile(
      join(dir, 'config.jsonc'),
      [
        '{',
        '  // sort by package name',
        '  "sync": { "upgradeSorting": "pkgname", "alwaysShowPkgOrigin": true, },',
        '  "colors": { "versionDiffNew": 12 },',
        '}'
      ].join('\n')
    );

    const renderConfig = await new ConfigManager({ configDir: dir }).loadRenderConfig();
    assert.equal(renderConfig.sortMode, 'name');
    assert.equal(renderConfig.alwaysShowPkgOrigin, true);
    assert.deepEqual(renderConfig.colors, { version: 10, versionDiffOld: 11, versionDiffNew: 12 });
  });

  it('prefers an explicit config file', async () => {
    const file = join(dir, 'custom.json');
    await writeFile(file, '{ "sync": { "upgradeSorting": "repo" } }');

    const config = await new ConfigManager({ configFile: file }).load();
    assert.equal(config.sync.upgradeSorting, 'repo');
  });

  it('rejects a missing explicit config file', async () => {
    const manager = new ConfigManager({ configFile: join(dir, 'missing.jsonc') });
    await assert.rejects(manager.load(), ConfigError);
  });

  it('rejects an unknown sort order', async () => {
    await writeFile(join(dir, 'config.jsonc'), '{ "sync": { "upgradeSorting": "size" } }');
    await assert.rejects(new ConfigManager({ configDir: dir }).load(), {
      code: 'CONFIG_ERROR',
      message: "sync.upgradeSorting must be one of versiondiff, pkgname, repo, got 'size'"
    });
  });

  it('wraps unparseable files in a ConfigError', async () => {
    await writeFile(join(dir, 'config.jsonc'), '{ "sync": ');
    await assert.rejects(new ConfigManager({ configDir: dir }).load(), ConfigError);
  });
});

describe('mergeConfig', () => {
  it('fills missing sections from the defaults', () => {
    assert.deepEqual(mergeConfig({}), DEFAULT_CONFIG);
  });

  it('rejects colors outside the 16-color palette', () => {
    assert.throws(() => mergeConfig({ colors: { version: 16 } }), {
      message: 'colors.version must be an integer between 0 and 15'
    });
    assert.throws(() => mergeConfig({ colors: { versionDiffOld: 1.5 } }), ConfigError);
  });

  it('rejects non-object documents and sections', () => {
    assert.throws(() => mergeConfig([]), ConfigError);
    assert.throws(() => mergeConfig({ sync: 'versiondiff' }), {
      message: "Config section 'sync' must be an object, got string"
    });
    assert.throws(() => mergeConfig({ sync: { alwaysShowPkgOrigin: 'yes' } }), ConfigError);
  });
});

describe('render config', () => {
  it('maps sort settings to sort modes', () => {
    assert.equal(toSortMode('versiondiff'), 'diff-weight');
    assert.equal(toSortMode('pkgname'), 'name');
    assert.equal(toSortMode('repo'), 'repo');
  });

  it('is frozen', () => {
    assert.equal(DEFAULT_RENDER_CONFIG.sortMode, 'diff-weight');
    assert.ok(Object.isFrozen(DEFAULT_RENDER_CONFIG));
    assert.ok(Object.isFrozen(toRenderConfig(DEFAULT_CONFIG).colors));
  });
});
