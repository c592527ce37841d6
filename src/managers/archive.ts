import * as fs from 'node:fs';
import * as path from 'node:path';
import { text } from 'node:stream/consumers';
import { pipeline } from 'node:stream/promises';
import archiver from 'archiver';
import * as yauzl from 'yauzl-promise';

const FILE_TYPE_MASK = 0o170000;
const DIRECTORY_TYPE = 0o040000;
const SYMLINK_TYPE = 0o120000;

/**
 * Packs a snapshot workspace into one ZIP file and unpacks it again.
 * Entry names are relative to the workspace, so a dump sits at "shop.sql"
 * and a backed-up "/var/www" at "var/www/...".
 */
export class ArchiveManager {
  constructor(private level = 6) {}

  async create(sourceDir: string, archivePath: string): Promise<number> {
    await fs.promises.mkdir(path.dirname(archivePath), { recursive: true });

    const output = fs.createWriteStream(archivePath);
    const archive = archiver('zip', { zlib: { level: this.level } });

    const written = new Promise<void>((resolve, reject) => {
      output.on('close', resolve);
      output.on('error', reject);
      archive.on('error', reject);
    });

    archive.pipe(output);
    archive.glob('**/*', {
      cwd: sourceDir,
      dot: true,
    });
    await archive.finalize();
    await written;

    const stats = await fs.promises.stat(archivePath);
    return stats.size;
  }

  /**
   * Unpack into `targetDir`, recreating symlinks and unix modes. Directory
   * modes are applied after every entry is written, deepest first.
   */
  async extract(archivePath: string, targetDir: string): Promise<void> {
    const normalizedTargetDir = path.resolve(targetDir);
    await fs.promises.mkdir(normalizedTargetDir, { recursive: true });

    const zip = await yauzl.open(archivePath);
    const directoryModes: { path: string; mode: number }[] = [];

    try {
      for await (const entry of zip) {
        const entryPath = path.resolve(normalizedTargetDir, entry.filename);

        // Security: prevent path traversal
        if (!entryPath.startsWith(normalizedTargetDir + path.sep) && entryPath !== normalizedTargetDir) {
          throw new Error(`Invalid entry path: ${entry.filename}`);
        }

        // Unix mode lives in the high half of the external attributes
        const unixMode = entry.externalFileAttributes >>> 16;
        const fileType = unixMode & FILE_TYPE_MASK;
        const permissions = unixMode & 0o7777;

        if (entry.filename.endsWith('/') || fileType === DIRECTORY_TYPE) {
          await fs.promises.mkdir(entryPath, { recursive: true });
          if (permissions !== 0) {
            directoryModes.push({ path: entryPath, mode: permissions });
          }
          continue;
        }

        await fs.promises.mkdir(path.dirname(entryPath), { recursive: true });

        if (fileType === SYMLINK_TYPE) {
          const linkTarget = await text(await entry.openReadStream());
          await fs.promises.rm(entryPath, { force: true });
          await fs.promises.symlink(linkTarget, entryPath);
          continue;
        }

        const readStream = await entry.openReadStream();
        await pipeline(readStream, fs.createWriteStream(entryPath));
        if (permissions !== 0) {
          await fs.promises.chmod(entryPath, permissions);
        }
      }
    } finally {
      await zip.close();
    }

    directoryModes.sort((a, b) => b.path.split(path.sep).length - a.path.split(path.sep).length);
    for (const directory of directoryModes) {
      await fs.promises.chmod(directory.path, directory.mode);
    }
  }

  /**
   * Names of the files at the archive root (e.g. the database dumps).
   */
  async listRootFiles(archivePath: string): Promise<string[]> {
    const zip = await yauzl.open(archivePath);
    const names: string[] = [];
    try {
      for await (const entry of zip) {
        if (!entry.filename.includes('/')) names.push(entry.filename);
      }
    } finally {
      await zip.close();
    }
    return names.sort();
  }
}
