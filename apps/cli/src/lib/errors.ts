import { EXIT_CODES, type ExitCode, type ManifestIssue } from '@skillpin/shared';

export class SkillpinError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: ExitCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed input from the caller: an unsupported location, a missing or broken proxy record. */
export class UsageError extends SkillpinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'usage_error', EXIT_CODES.usage, details);
  }
}

/** Transport failure, timeout, unexpected status or payload from the remote host. */
export class RemoteUnavailableError extends SkillpinError {
  constructor(message: string, details?: Record<string, unknown>, code = 'remote_unavailable') {
    super(message, code, EXIT_CODES.remote, details);
  }
}

export class ReferenceNotFoundError extends RemoteUnavailableError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'reference_not_found');
  }
}

/** A manifest broke the naming/length rules. Nothing was written. */
export class ValidationFailedError extends SkillpinError {
  constructor(
    message: string,
    public readonly issues: ManifestIssue[],
    details?: Record<string, unknown>,
  ) {
    super(message, 'validation_failed', EXIT_CODES.validation, details);
  }
}

/**
 * The bytes at a pinned, supposedly immutable address no longer hash to the
 * recorded checksum. Treat as a security event, not a transient failure.
 */
export class IntegrityMismatchError extends SkillpinError {
  constructor(
    message: string,
    public readonly expected: string,
    public readonly actual: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'integrity_mismatch', EXIT_CODES.mismatch, details);
  }
}

export function exitCodeFor(err: unknown): ExitCode {
  return err instanceof SkillpinError ? err.exitCode : EXIT_CODES.usage;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
