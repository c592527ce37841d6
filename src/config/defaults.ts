import * as os from 'node:os';
import * as path from 'node:path';
import { CLI_NAME } from './constants.js';

/**
 * Hardcoded defaults for vaultsync
 * Anything here can be overridden from the config file
 */
export const DEFAULTS = {
  configFile: `${CLI_NAME}.yaml`,
  retentionDays: 30,
  workingDir: path.join(os.tmpdir(), CLI_NAME),
  allowedRoot: '/',
  database: {
    user: 'root',
    host: 'localhost',
  },
  storage: {
    signingRegion: 'us-east-1',  // S3-compatible providers mostly ignore it
  },
} as const;
