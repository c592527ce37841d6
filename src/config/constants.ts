import * as fs from 'node:fs';

interface PackageInfo {
  name: string;
  version: string;
  cliName?: string;
  displayName?: string;
}

// src/config and dist/config both sit two levels below the package root
const packageJson: PackageInfo = JSON.parse(
  fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
);

/**
 * CLI name - used for technical identifiers (config file, working directory)
 * Derived from package.json "cliName" field, fallback to "name"
 */
export const CLI_NAME: string = packageJson.cliName || packageJson.name;

/**
 * Tool display name - used for user-facing messages
 * Derived from package.json "displayName" field, fallback to CLI_NAME
 */
export const TOOL_NAME: string = packageJson.displayName || CLI_NAME;

export const VERSION: string = packageJson.version;

/**
 * Name of the compressed bundle, both in the working root and under each
 * snapshot prefix in a bucket.
 */
export const ARCHIVE_NAME = 'backup.zip';

/**
 * Prefix of the alias that always holds a copy of the newest snapshot.
 */
export const LATEST_ALIAS = 'latest';

/**
 * Suffix of database dump files at the bundle root.
 */
export const DUMP_EXTENSION = '.sql';

/**
 * System schemas never backed up when databases are discovered.
 */
export const EXCLUDED_DATABASES: readonly string[] = [
  'mysql',
  'information_schema',
  'performance_schema',
  'sys',
];

export const ENVIRONMENTS = ['dev', 'prod'] as const;
