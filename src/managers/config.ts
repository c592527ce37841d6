import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { DEFAULTS } from '../config/defaults.js';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import { splitList } from '../utils/helpers.js';
import type {
  DatabaseCredentials,
  Environment,
  FileConfig,
  RegionTarget,
  Settings,
  StorageEnvironmentConfig,
} from '../types/config.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigManager {
  private config: FileConfig | null = null;

  constructor(private filePath: string) {}

  async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ConfigurationError(
          [`config file not found at ${this.filePath}`],
          'Pass --config <file> or set VAULTSYNC_CONFIG'
        );
      }
      throw new ConfigurationError([`failed to read ${this.filePath}: ${errorMessage(error)}`]);
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ConfigurationError([`failed to parse ${this.filePath}: ${errorMessage(error)}`]);
    }

    // An empty file is allowed: everything may come from the environment
    if (parsed === null || parsed === undefined) {
      this.config = {};
      return;
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigurationError([`${this.filePath} must contain a mapping at the top level`]);
    }
    this.config = parsed;
    this.validate();
  }

  getConfig(): FileConfig {
    if (!this.config) {
      throw new Error('Config not loaded');
    }
    return this.config;
  }

  private validate(): void {
    if (!this.config) {
      throw new Error('Config is null');
    }

    const problems: string[] = [];
    const { backup } = this.config;
    if (backup?.paths !== undefined && !Array.isArray(backup.paths)) {
      problems.push('backup.paths must be a list');
    }
    if (backup?.databases !== undefined && !Array.isArray(backup.databases)) {
      problems.push('backup.databases must be a list');
    }
    if (backup?.retentionDays !== undefined && typeof backup.retentionDays !== 'number') {
      problems.push('backup.retentionDays must be a number');
    }
    if (problems.length > 0) {
      throw new ConfigurationError(problems.map(p => `${this.filePath}: ${p}`));
    }
  }

  /**
   * Resolve the settings for one environment, environment variables first.
   */
  resolve(environment: Environment, env: EnvSource = process.env): Settings {
    return resolveSettings(this.getConfig(), env, environment);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function pick(env: EnvSource, name: string, fallback: string | undefined): string | undefined {
  const value = env[name];
  return value !== undefined && value !== '' ? value : fallback;
}

function pickList(env: EnvSource, name: string, fallback: string[] | undefined): string[] {
  const value = env[name];
  if (value !== undefined && value !== '') {
    return splitList(value);
  }
  return (fallback ?? []).map(item => String(item).trim()).filter(item => item !== '');
}

/**
 * Build the immutable settings for `environment` from the config file and
 * the process environment. Every problem is collected before throwing.
 */
export function resolveSettings(file: FileConfig, env: EnvSource, environment: Environment): Settings {
  const problems: string[] = [];
  const dev = environment === 'dev';
  const suffix = dev ? '_DEV' : '';
  const storage: StorageEnvironmentConfig = (dev ? file.storage?.dev : file.storage?.prod) ?? {};

  const serviceName = pick(env, 'SERVICE_NAME', file.service?.name);
  if (!serviceName) {
    problems.push('service name not found (service.name or SERVICE_NAME)');
  } else if (!/^[a-z0-9][a-z0-9.-]*$/.test(serviceName)) {
    problems.push(`service name '${serviceName}' cannot be used in a bucket name`);
  }

  const accessKey = pick(env, `S3_BACKUP_ACCESS_KEY${suffix}`, storage.accessKey);
  if (!accessKey) {
    problems.push(`S3 access key not found (storage.${environment}.accessKey or S3_BACKUP_ACCESS_KEY${suffix})`);
  }
  const secretKey = pick(env, `S3_BACKUP_SECRET_KEY${suffix}`, storage.secretKey);
  if (!secretKey) {
    problems.push(`S3 secret key not found (storage.${environment}.secretKey or S3_BACKUP_SECRET_KEY${suffix})`);
  }

  const primary = pick(env, `S3_PRIMARY_ENDPOINT${suffix}`, storage.regions?.primary);
  const secondary = pick(env, `S3_SECONDARY_ENDPOINT${suffix}`, storage.regions?.secondary);
  const regions: RegionTarget[] = [];
  if (!primary) {
    problems.push(`primary region endpoint not found (storage.${environment}.regions.primary or S3_PRIMARY_ENDPOINT${suffix})`);
  } else {
    regions.push({ label: dev ? 'primary-dev' : 'primary', endpoint: primary });
  }
  if (secondary) {
    regions.push({ label: dev ? 'secondary-dev' : 'secondary', endpoint: secondary });
  }

  const paths = pickList(env, 'PATH_LIST', file.backup?.paths);
  for (const p of paths) {
    if (!path.isAbsolute(p)) {
      problems.push(`backup path '${p}' must be absolute`);
    }
  }

  const databases = pickList(env, 'DATABASE_NAME', file.backup?.databases);
  const password = pick(env, 'DATABASE_PASSWORD', file.database?.password);
  let database: DatabaseCredentials | null = null;
  if (password) {
    database = {
      user: pick(env, 'DATABASE_USERNAME', file.database?.user) ?? DEFAULTS.database.user,
      host: pick(env, 'DATABASE_HOST', file.database?.host) ?? DEFAULTS.database.host,
      password,
    };
  } else if (databases.length > 0) {
    problems.push('databases are listed but no database password is configured (database.password or DATABASE_PASSWORD)');
  }

  const rawRetention = pick(env, 'RETENTION_DAYS', file.backup?.retentionDays?.toString());
  const retentionDays = rawRetention === undefined ? DEFAULTS.retentionDays : Number(rawRetention);
  if (!Number.isInteger(retentionDays) || retentionDays < 1) {
    problems.push(`retention days must be a positive integer, got '${rawRetention}'`);
  }

  const allowedRoot = file.backup?.allowedRoot ?? DEFAULTS.allowedRoot;
  if (!path.isAbsolute(allowedRoot)) {
    problems.push(`allowed root '${allowedRoot}' must be absolute`);
  }

  if (problems.length > 0 || !serviceName || !accessKey || !secretKey) {
    throw new ConfigurationError(problems, 'Stopping before anything was changed');
  }

  return Object.freeze({
    environment,
    serviceName,
    paths: Object.freeze(paths),
    databases: Object.freeze(databases),
    database: database ? Object.freeze(database) : null,
    storage: Object.freeze({
      accessKey,
      secretKey,
      signingRegion: file.storage?.signingRegion ?? DEFAULTS.storage.signingRegion,
    }),
    regions: Object.freeze(regions.map(region => Object.freeze(region))),
    retentionDays,
    workingDir: path.resolve(file.backup?.workingDir ?? DEFAULTS.workingDir),
    allowedRoot: path.resolve(allowedRoot),
  });
}

/**
 * Bucket holding every snapshot of a service in one region.
 */
export function bucketName(settings: Pick<Settings, 'serviceName'>, region: RegionTarget): string {
  return `${settings.serviceName}-backup-${region.label}`;
}

/**
 * Pick a region by label; defaults to the primary-equivalent one.
 */
export function selectRegion(settings: Pick<Settings, 'regions'>, label?: string): RegionTarget {
  const region = label === undefined
    ? settings.regions[0]
    : settings.regions.find(r => r.label === label);
  if (!region) {
    const known = settings.regions.map(r => r.label).join(', ');
    throw new ConfigurationError([`unknown region '${label ?? ''}' (configured: ${known})`]);
  }
  return region;
}
