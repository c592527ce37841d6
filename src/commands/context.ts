import * as path from 'node:path';
import { ENVIRONMENTS } from '../config/constants.js';
import { DEFAULTS } from '../config/defaults.js';
import { UserError } from '../errors/index.js';
import { ConfigManager } from '../managers/config.js';
import { MariaDBManager } from '../managers/database.js';
import { createS3StoreFactory } from '../managers/object-store.js';
import { SyncOrchestrator } from '../managers/orchestrator.js';
import type { Environment, Settings } from '../types/config.js';
import { consoleReporter, type Reporter } from '../utils/progress.js';

export interface GlobalOptions {
  env: string;
  config?: string;
}

export function parseEnvironment(value: string): Environment {
  const match = ENVIRONMENTS.find(env => env === value);
  if (!match) {
    throw new UserError(
      `Unknown environment '${value}'`,
      `Use --env ${ENVIRONMENTS.join(' or --env ')}`
    );
  }
  return match;
}

/**
 * Config file location: --config, then VAULTSYNC_CONFIG, then ./vaultsync.yaml.
 */
export function configPath(option: string | undefined, env = process.env): string {
  return path.resolve(option ?? env.VAULTSYNC_CONFIG ?? DEFAULTS.configFile);
}

export async function loadSettings(options: GlobalOptions): Promise<Settings> {
  const environment = parseEnvironment(options.env);
  const config = new ConfigManager(configPath(options.config));
  await config.load();
  return config.resolve(environment);
}

export function createOrchestrator(settings: Settings, reporter: Reporter = consoleReporter): SyncOrchestrator {
  return new SyncOrchestrator({
    settings,
    stores: createS3StoreFactory(settings.storage),
    database: settings.database ? new MariaDBManager(settings.database) : null,
    reporter,
  });
}
