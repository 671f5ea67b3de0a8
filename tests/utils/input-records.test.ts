import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  parseInstallInfo,
  parseInstalledVersions,
  parseSearchRecords,
  parseUpgradePlan
} from '../../src/utils/input-records.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('parseInstallInfo', () => {
  it('maps relation lists onto records', () => {
    const info = parseInstallInfo(
      {
        name: 'foo',
        currentVersion: '1.0',
        newVersion: '1.1',
        repository: 'extra',
        requiredBy: ['app'],
        providedBy: ['foo-bin'],
        memberOf: ['base'],
        develPkgAgeDays: 2
      },
      'entry'
    );

    assert.deepEqual(info, {
      name: 'foo',
      currentVersion: '1.0',
      newVersion: '1.1',
      repository: 'extra',
      requiredBy: [{ packageName: 'app' }],
      providedBy: [{ name: 'foo-bin' }],
      memberOf: ['base'],
      replaces: [],
      description: undefined,
      develPkgAgeDays: 2
    });
  });

  it('requires a name', () => {
    assert.throws(() => parseInstallInfo({ newVersion: '1.0' }, 'entry'), {
      message: 'Validation error: entry.name is required'
    });
  });

  it('rejects badly typed fields', () => {
    assert.throws(() => parseInstallInfo({ name: 'foo', replaces: 'bar' }, 'entry'), {
      message: 'Validation error: entry.replaces must be an array of strings'
    });
    assert.throws(() => parseInstallInfo({ name: 'foo', develPkgAgeDays: -1 }, 'entry'), ValidationError);
    assert.throws(() => parseInstallInfo({ name: 'foo', currentVersion: 1 }, 'entry'), {
      message: 'Validation error: entry.currentVersion must be a string, got number'
    });
  });
});

describe('parseUpgradePlan', () => {
  it('parses each category', () => {
    const plan = parseUpgradePlan({
      'repo-update': [{ name: 'foo', repository: 'core' }],
      'aur-new-dep': [{ name: 'bar' }]
    });

    assert.deepEqual(Object.keys(plan), ['repo-update', 'aur-new-dep']);
    assert.equal(plan['aur-new-dep']?.[0]?.name, 'bar');
    assert.equal(plan['aur-new-dep']?.[0]?.repository, undefined);
  });

  it('rejects unknown categories', () => {
    assert.throws(() => parseUpgradePlan({ 'aur-remove': [] }), /Unknown category 'aur-remove'/);
  });

  it('names the failing record', () => {
    assert.throws(() => parseUpgradePlan({ 'repo-update': [{ name: 'ok' }, 'foo'] }), {
      message: 'Validation error: repo-update[1] must be an object, got string'
    });
  });
});

describe('parseSearchRecords', () => {
  it('derives the origin from the repository field', () => {
    const [repo, aur] = parseSearchRecords([
      { name: 'bash', version: '5.2', repository: 'core' },
      { name: 'yay', version: '12.0', numVotes: 100, popularity: 2.5, outOfDate: 1700000000 }
    ]);

    assert.deepEqual(repo?.origin, { kind: 'repo', repository: 'core' });
    assert.equal(repo?.description, '');
    assert.deepEqual(aur?.origin, { kind: 'aur' });
    assert.equal(aur?.numVotes, 100);
    assert.equal(aur?.popularity, 2.5);
    assert.equal(aur?.outOfDate, 1700000000);
  });

  it('requires an array', () => {
    assert.throws(() => parseSearchRecords({}), {
      message: 'Validation error: Search results must be an array, got object'
    });
  });
});

describe('parseInstalledVersions', () => {
  it('builds a name to version map', () => {
    const installed = parseInstalledVersions({ bash: '5.2', yay: '12.0' });
    assert.equal(installed.get('bash'), '5.2');
    assert.equal(installed.size, 2);
  });

  it('rejects non-string versions', () => {
    assert.throws(() => parseInstalledVersions({ bash: 5 }), ValidationError);
  });
});
