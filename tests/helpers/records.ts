import type { InstallInfo, SearchRecord, VersionColors } from '../../src/types/index.js';
import type { OutputPort } from '../../src/core/ports/output.js';

export const TEST_COLORS: VersionColors = {
  version: 10,
  versionDiffOld: 11,
  versionDiffNew: 9
};

export function pkg(name: string, overrides: Partial<InstallInfo> = {}): InstallInfo {
  return {
    name,
    requiredBy: [],
    providedBy: [],
    memberOf: [],
    replaces: [],
    ...overrides
  };
}

export function aurHit(name: string, overrides: Partial<SearchRecord> = {}): SearchRecord {
  return {
    name,
    version: '1.0',
    description: '',
    origin: { kind: 'aur' },
    groups: [],
    ...overrides
  };
}

export function repoHit(name: string, repository: string, overrides: Partial<SearchRecord> = {}): SearchRecord {
  return {
    name,
    version: '1.0',
    description: '',
    origin: { kind: 'repo', repository },
    groups: [],
    ...overrides
  };
}

export interface CollectingOutput extends OutputPort {
  stdout: string[];
  stderr: string[];
}

export function collectingOutput(): CollectingOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    info(message: string): void {
      stdout.push(message);
    },
    warn(message: string): void {
      stderr.push(message);
    }
  };
}
