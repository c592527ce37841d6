import * as path from 'node:path';
import { UnsafePathError } from '../errors/index.js';

/**
 * Canonicalize a restore target and make sure it may be emptied.
 *
 * Rejected: empty strings, relative paths, the filesystem root, and anything
 * that does not sit strictly below `allowedRoot`.
 */
export function resolveRestorePath(raw: string, allowedRoot = '/'): string {
  const trimmed = raw.trim();

  if (trimmed === '') {
    throw new UnsafePathError(raw, 'path is empty');
  }
  if (!path.isAbsolute(trimmed)) {
    throw new UnsafePathError(raw, 'path must be absolute');
  }

  const resolved = path.resolve(trimmed);
  if (resolved === path.parse(resolved).root) {
    throw new UnsafePathError(raw, 'path resolves to the filesystem root');
  }

  const root = path.resolve(allowedRoot);
  const relative = path.relative(root, resolved);
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new UnsafePathError(raw, `path is not inside the allowed root ${root}`);
  }

  return resolved;
}

/**
 * Location of a backed-up path inside an unpacked bundle: absolute paths are
 * mirrored below the bundle root ("/var/www" -> "<bundle>/var/www").
 */
export function bundlePathFor(bundleDir: string, absolutePath: string): string {
  return path.join(bundleDir, path.resolve(absolutePath));
}
