import { describe, test, expect } from 'vitest';
import { bundlePathFor, resolveRestorePath } from './paths.js';
import { UnsafePathError } from '../errors/index.js';

describe('resolveRestorePath', () => {
  test('returns the canonical path', () => {
    expect(resolveRestorePath('/var/www/html/')).toBe('/var/www/html');
    expect(resolveRestorePath('/var/www/../lib/app')).toBe('/var/lib/app');
  });

  test('rejects an empty path', () => {
    expect(() => resolveRestorePath('')).toThrow(UnsafePathError);
    expect(() => resolveRestorePath('   ')).toThrow("Refusing to use '   ' as a restore target: path is empty");
  });

  test('rejects the filesystem root in any spelling', () => {
    expect(() => resolveRestorePath('/')).toThrow('path resolves to the filesystem root');
    expect(() => resolveRestorePath('//')).toThrow('path resolves to the filesystem root');
    expect(() => resolveRestorePath('/var/..')).toThrow('path resolves to the filesystem root');
  });

  test('rejects relative paths', () => {
    expect(() => resolveRestorePath('var/www')).toThrow('path must be absolute');
  });

  test('rejects paths outside the allowed root', () => {
    expect(resolveRestorePath('/srv/app/data', '/srv/app')).toBe('/srv/app/data');
    expect(() => resolveRestorePath('/srv/app', '/srv/app')).toThrow('path is not inside the allowed root /srv/app');
    expect(() => resolveRestorePath('/srv/app/../other', '/srv/app')).toThrow('path is not inside the allowed root /srv/app');
    expect(() => resolveRestorePath('/etc', '/srv/app')).toThrow(UnsafePathError);
  });

  test('accepts names that merely start with two dots', () => {
    expect(resolveRestorePath('/srv/app/..cache', '/srv/app')).toBe('/srv/app/..cache');
  });
});

describe('bundlePathFor', () => {
  test('mirrors the absolute path below the bundle directory', () => {
    expect(bundlePathFor('/tmp/work/20240101-000000', '/var/www/html')).toBe('/tmp/work/20240101-000000/var/www/html');
  });
});
