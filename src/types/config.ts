import type { ENVIRONMENTS } from '../config/constants.js';

export type Environment = (typeof ENVIRONMENTS)[number];

/**
 * Shape of the YAML config file. Every field is optional here; missing
 * values may come from the environment instead.
 */
export interface FileConfig {
  service?: {
    name?: string;
  };
  backup?: {
    paths?: string[];
    databases?: string[];
    retentionDays?: number;
    workingDir?: string;
    allowedRoot?: string;
  };
  database?: {
    user?: string;
    password?: string;
    host?: string;
  };
  storage?: {
    signingRegion?: string;
    dev?: StorageEnvironmentConfig;
    prod?: StorageEnvironmentConfig;
  };
}

export interface StorageEnvironmentConfig {
  accessKey?: string;
  secretKey?: string;
  regions?: {
    primary?: string;
    secondary?: string;
  };
}

export interface DatabaseCredentials {
  user: string;
  password: string;
  host: string;
}

export interface StorageCredentials {
  accessKey: string;
  secretKey: string;
  signingRegion: string;
}

/**
 * A storage region: `label` selects the bucket, `endpoint` the S3 host.
 */
export interface RegionTarget {
  label: string;
  endpoint: string;
}

/**
 * Fully resolved, read-only settings for one invocation.
 */
export interface Settings {
  readonly environment: Environment;
  readonly serviceName: string;
  readonly paths: readonly string[];
  readonly databases: readonly string[];
  readonly database: Readonly<DatabaseCredentials> | null;
  readonly storage: Readonly<StorageCredentials>;
  /** First entry is the primary-equivalent region of the environment. */
  readonly regions: readonly Readonly<RegionTarget>[];
  readonly retentionDays: number;
  readonly workingDir: string;
  readonly allowedRoot: string;
}
