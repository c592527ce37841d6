import * as fs from 'node:fs/promises';
import type { DatabaseClient, DropOutcome } from '../../src/managers/database.js';
import { ToolInvocationError } from '../../src/errors/index.js';

/**
 * Databases are plain strings: a dump writes the content to the file, a
 * load reads it back.
 */
export class FakeDatabase implements DatabaseClient {
  readonly databases = new Map<string, string>();
  readonly calls: string[] = [];
  readonly failing = new Set<string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, content] of Object.entries(initial)) {
      this.databases.set(name, content);
    }
  }

  async listDatabases(): Promise<string[]> {
    this.calls.push('list');
    return [...this.databases.keys()];
  }

  async dumpDatabase(name: string, file: string): Promise<void> {
    this.calls.push(`dump ${name}`);
    const content = this.databases.get(name);
    if (content === undefined || this.failing.has(name)) {
      throw new ToolInvocationError(`Dump database ${name}`, `Unknown database '${name}'`);
    }
    await fs.writeFile(file, content);
  }

  async dropDatabase(name: string): Promise<DropOutcome> {
    this.calls.push(`drop ${name}`);
    return this.databases.delete(name) ? 'dropped' : 'absent';
  }

  async createDatabase(name: string): Promise<void> {
    this.calls.push(`create ${name}`);
    this.databases.set(name, '');
  }

  async loadDump(name: string, file: string): Promise<void> {
    this.calls.push(`load ${name}`);
    if (this.failing.has(name)) {
      throw new ToolInvocationError(`Load dump into ${name}`, 'ERROR 1064 (42000): syntax error');
    }
    this.databases.set(name, await fs.readFile(file, 'utf-8'));
  }
}
