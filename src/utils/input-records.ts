import type { CategoryName, InstallInfo, SearchRecord, UpgradePlan } from '../types/index.js';
import { CATEGORY_ORDER } from '../types/index.js';
import { ValidationError } from './errors.js';
import { describeValue, isNonNegativeInteger, isRecord, isStringArray } from './validation/guards.js';

/**
 * Parsers for the JSON documents the resolver hands over: upgrade plans,
 * search results and installed-version maps. Rejects anything malformed
 * before it reaches a renderer.
 */

function optionalString(raw: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${where}.${key} must be a string, got ${describeValue(value)}`);
  }
  return value;
}

function requiredString(raw: Record<string, unknown>, key: string, where: string): string {
  const value = optionalString(raw, key, where);
  if (!value) {
    throw new ValidationError(`${where}.${key} is required`);
  }
  return value;
}

function optionalNumber(raw: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${where}.${key} must be a number, got ${describeValue(value)}`);
  }
  return value;
}

function optionalCount(raw: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = optionalNumber(raw, key, where);
  if (value !== undefined && !isNonNegativeInteger(value)) {
    throw new ValidationError(`${where}.${key} must be a non-negative integer`);
  }
  return value;
}

function stringList(raw: Record<string, unknown>, key: string, where: string): string[] {
  const value = raw[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!isStringArray(value)) {
    throw new ValidationError(`${where}.${key} must be an array of strings`);
  }
  return value;
}

export function parseInstallInfo(value: unknown, where: string): InstallInfo {
  if (!isRecord(value)) {
    throw new ValidationError(`${where} must be an object, got ${describeValue(value)}`);
  }

  const info: InstallInfo = {
    name: requiredString(value, 'name', where),
    currentVersion: optionalString(value, 'currentVersion', where),
    newVersion: optionalString(value, 'newVersion', where),
    repository: optionalString(value, 'repository', where),
    requiredBy: stringList(value, 'requiredBy', where).map(packageName => ({ packageName })),
    providedBy: stringList(value, 'providedBy', where).map(name => ({ name })),
    memberOf: stringList(value, 'memberOf', where),
    replaces: stringList(value, 'replaces', where),
    description: optionalString(value, 'description', where),
    develPkgAgeDays: optionalCount(value, 'develPkgAgeDays', where)
  };

  return info;
}

function isCategoryName(key: string): key is CategoryName {
  return CATEGORY_ORDER.some(name => name === key);
}

/**
 * `{ "repo-update": [...], "aur-update": [...] }` keyed by category name
 */
export function parseUpgradePlan(value: unknown): UpgradePlan {
  if (!isRecord(value)) {
    throw new ValidationError(`Upgrade plan must be an object, got ${describeValue(value)}`);
  }

  const plan: UpgradePlan = {};
  for (const [key, entries] of Object.entries(value)) {
    if (!isCategoryName(key)) {
      throw new ValidationError(`Unknown category '${key}'; expected one of ${CATEGORY_ORDER.join(', ')}`);
    }
    if (!Array.isArray(entries)) {
      throw new ValidationError(`Category '${key}' must be an array, got ${describeValue(entries)}`);
    }
    plan[key] = entries.map((entry: unknown, index) => parseInstallInfo(entry, `${key}[${index}]`));
  }
  return plan;
}

export function parseSearchRecord(value: unknown, where: string): SearchRecord {
  if (!isRecord(value)) {
    throw new ValidationError(`${where} must be an object, got ${describeValue(value)}`);
  }

  const repository = optionalString(value, 'repository', where);
  return {
    name: requiredString(value, 'name', where),
    version: optionalString(value, 'version', where) ?? '',
    description: optionalString(value, 'description', where) ?? '',
    origin: repository ? { kind: 'repo', repository } : { kind: 'aur' },
    groups: stringList(value, 'groups', where),
    numVotes: optionalCount(value, 'numVotes', where),
    popularity: optionalNumber(value, 'popularity', where),
    outOfDate: optionalNumber(value, 'outOfDate', where)
  };
}

export function parseSearchRecords(value: unknown): SearchRecord[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`Search results must be an array, got ${describeValue(value)}`);
  }
  return value.map((entry: unknown, index) => parseSearchRecord(entry, `results[${index}]`));
}

/**
 * `{ "name": "version" }` of locally installed packages
 */
export function parseInstalledVersions(value: unknown): Map<string, string> {
  if (!isRecord(value)) {
    throw new ValidationError(`Installed versions must be an object, got ${describeValue(value)}`);
  }

  const installed = new Map<string, string>();
  for (const [name, version] of Object.entries(value)) {
    if (typeof version !== 'string') {
      throw new ValidationError(`Installed version of '${name}' must be a string, got ${describeValue(version)}`);
    }
    installed.set(name, version);
  }
  return installed;
}
