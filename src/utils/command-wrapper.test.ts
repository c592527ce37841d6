import { describe, test, expect, vi, afterEach } from 'vitest';
import { reportError, wrapCommand } from './command-wrapper.js';
import { ConfigurationError, PartialFailureError, PreconditionError } from '../errors/index.js';

describe('reportError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  test('user errors exit with 1', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(reportError(new ConfigurationError(['service name not found']))).toBe(1);
    expect(reportError(new PreconditionError('Restore point missing'))).toBe(1);
  });

  test('system errors exit with 2', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(reportError(new PartialFailureError('Backup incomplete:', ['secondary: upload failed']))).toBe(2);
  });

  test('unknown errors exit with 1', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(reportError(new Error('boom'))).toBe(1);
    expect(reportError('boom')).toBe(1);
  });

  test('prints the hint after the message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    reportError(new PreconditionError('Restore point missing', 'Run show first'));

    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[0]?.[1]).toBe('Restore point missing');
  });
});

describe('wrapCommand', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  test('sets the exit code instead of throwing', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const command = wrapCommand(async (_name: string) => {
      throw new PartialFailureError('Restore incomplete:', ['shop: load failed']);
    });

    await command('restore');

    expect(process.exitCode).toBe(2);
  });

  test('leaves the exit code alone on success', async () => {
    const command = wrapCommand(async () => {});

    await command();

    expect(process.exitCode).toBeUndefined();
  });
});
