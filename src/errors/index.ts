/**
 * User-facing errors for invalid input, configuration or missing resources.
 * Nothing destructive has happened when one of these is thrown.
 * Exit code: 1
 *
 * Examples:
 * - Missing S3 credentials
 * - Restore point not found
 * - Unsafe restore path
 */
export class UserError extends Error {
  constructor(message: string, public hint?: string) {
    super(message);
    this.name = 'UserError';
  }
}

/**
 * System-level errors for tool or infrastructure failures.
 * Steps already applied are not rolled back.
 * Exit code: 2
 *
 * Examples:
 * - mariadb-dump exited non-zero
 * - Upload to a storage region failed
 * - Permission denied while restoring files
 */
export class SystemError extends Error {
  constructor(message: string, public hint?: string) {
    super(message);
    this.name = 'SystemError';
  }
}

/**
 * A mandatory setting is missing or invalid. Carries every problem found,
 * not just the first one.
 */
export class ConfigurationError extends UserError {
  constructor(public readonly problems: string[], hint?: string) {
    super(
      problems.length === 1
        ? `Invalid configuration: ${problems[0]}`
        : `Invalid configuration:\n${problems.map(p => `  - ${p}`).join('\n')}`,
      hint
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * The requested operation cannot start, e.g. the restore point does not exist.
 */
export class PreconditionError extends UserError {
  constructor(message: string, hint?: string) {
    super(message, hint);
    this.name = 'PreconditionError';
  }
}

/**
 * A path that must never reach a destructive removal.
 */
export class UnsafePathError extends UserError {
  constructor(public readonly path: string, reason: string) {
    super(`Refusing to use '${path}' as a restore target: ${reason}`);
    this.name = 'UnsafePathError';
  }
}

/**
 * An external tool or service call failed. `step` names what was being done.
 */
export class ToolInvocationError extends SystemError {
  constructor(public readonly step: string, detail: string, hint?: string) {
    super(`${step} failed: ${detail}`, hint);
    this.name = 'ToolInvocationError';
  }
}

/**
 * Some independent units (regions, databases) failed while others succeeded.
 */
export class PartialFailureError extends SystemError {
  constructor(message: string, public readonly failures: string[], hint?: string) {
    super(`${message}\n${failures.map(f => `  - ${f}`).join('\n')}`, hint);
    this.name = 'PartialFailureError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
