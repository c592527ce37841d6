import { $ } from 'execa';
import { ToolInvocationError, errorMessage } from '../errors/index.js';
import type { DatabaseCredentials } from '../types/config.js';

/**
 * Outcome of dropping a database. A database that was never there counts as
 * dropped for restore purposes.
 */
export type DropOutcome = 'dropped' | 'absent';

/**
 * The database operations the snapshot lifecycle needs. Every method throws
 * ToolInvocationError on failure.
 */
export interface DatabaseClient {
  listDatabases(): Promise<string[]>;
  dumpDatabase(name: string, file: string): Promise<void>;
  dropDatabase(name: string): Promise<DropOutcome>;
  createDatabase(name: string): Promise<void>;
  loadDump(name: string, file: string): Promise<void>;
}

/**
 * MariaDB/MySQL through the client tools (mariadb, mariadb-dump, mariadb-admin).
 * The password is handed over in MYSQL_PWD so it never shows up in `ps`.
 */
export class MariaDBManager implements DatabaseClient {
  constructor(private credentials: DatabaseCredentials) {}

  private get $$() {
    return $({ env: { MYSQL_PWD: this.credentials.password } });
  }

  private get login(): string[] {
    return ['-u', this.credentials.user, '-h', this.credentials.host];
  }

  async listDatabases(): Promise<string[]> {
    try {
      const { stdout } = await this.$$`mariadb ${this.login} -sN -e ${'SHOW DATABASES'}`;
      return stdout
        .split('\n')
        .map(line => line.trim())
        .filter(line => line !== '');
    } catch (error) {
      throw new ToolInvocationError('List databases', describeFailure(error));
    }
  }

  async dumpDatabase(name: string, file: string): Promise<void> {
    try {
      await this.$$`mariadb-dump ${this.login} --complete-insert --routines --triggers --single-transaction -r ${file} ${name}`;
    } catch (error) {
      throw new ToolInvocationError(`Dump database ${name}`, describeFailure(error));
    }
  }

  async dropDatabase(name: string): Promise<DropOutcome> {
    try {
      await this.$$`mariadb-admin -s ${this.login} -f drop ${name}`;
      return 'dropped';
    } catch (error) {
      const detail = describeFailure(error);
      if (/database doesn't exist|unknown database/i.test(detail)) {
        return 'absent';
      }
      throw new ToolInvocationError(`Drop database ${name}`, detail);
    }
  }

  async createDatabase(name: string): Promise<void> {
    try {
      await this.$$`mariadb-admin -s ${this.login} create ${name}`;
    } catch (error) {
      throw new ToolInvocationError(`Create database ${name}`, describeFailure(error));
    }
  }

  async loadDump(name: string, file: string): Promise<void> {
    try {
      await $({ env: { MYSQL_PWD: this.credentials.password }, inputFile: file })`mariadb ${this.login} -D ${name}`;
    } catch (error) {
      throw new ToolInvocationError(`Load dump into ${name}`, describeFailure(error));
    }
  }
}

/**
 * Prefer what the tool printed on stderr over execa's generic message.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string') {
    const stderr = error.stderr.trim();
    if (stderr !== '') {
      return stderr;
    }
  }
  return errorMessage(error);
}
