import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Settings } from '../../src/types/config.js';
import type { Reporter } from '../../src/utils/progress.js';

/**
 * Reporter that runs steps without printing and remembers warnings.
 */
export function createSilentReporter(): Reporter & { warnings: string[]; steps: string[] } {
  const warnings: string[] = [];
  const steps: string[] = [];
  return {
    warnings,
    steps,
    step: async (label, fn) => {
      steps.push(label);
      return fn();
    },
    info: () => {},
    warn: (message) => {
      warnings.push(message);
    },
  };
}

export async function makeTempDir(prefix = 'vaultsync-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function pathExists(p: string): Promise<boolean> {
  return fs.access(p).then(() => true).catch(() => false);
}

export function makeSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    environment: 'prod',
    serviceName: 'shop',
    paths: [],
    databases: [],
    database: { user: 'root', password: 'test-secret', host: 'localhost' },
    storage: { accessKey: 'test-access', secretKey: 'test-secret', signingRegion: 'us-east-1' },
    regions: [
      { label: 'primary', endpoint: 's3.one.example' },
      { label: 'secondary', endpoint: 's3.two.example' },
    ],
    retentionDays: 30,
    workingDir: path.join(os.tmpdir(), 'vaultsync-unused'),
    allowedRoot: '/',
    ...overrides,
  };
}
