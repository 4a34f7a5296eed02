/**
 * Kiln Errors
 *
 * Error codes plus one class per failure category. Validation problems are
 * returned as issue lists by the validator; `ValidationError` only wraps such
 * a list when a caller asks for a strict parse.
 *
 * @module errors/kiln-error
 */

export const ERROR_CODES = {
  MANIFEST_NOT_FOUND: 'KILN_MANIFEST_NOT_FOUND',
  MANIFEST_PARSE: 'KILN_MANIFEST_PARSE',
  MANIFEST_INVALID: 'KILN_MANIFEST_INVALID',
  CONVERSION_INVALID: 'KILN_CONVERSION_INVALID',
  PAYLOAD_INVALID: 'KILN_PAYLOAD_INVALID',
  GUEST_CONFIG_INVALID: 'KILN_GUEST_CONFIG_INVALID',
  DERIVATION_FAILED: 'KILN_DERIVATION_FAILED',
  ACCOUNTS_INVALID: 'KILN_ACCOUNTS_INVALID',
  REGISTRY_INVALID: 'KILN_REGISTRY_INVALID',
  SEED_COLLISION: 'KILN_SEED_COLLISION',
  IO_FAILED: 'KILN_IO_FAILED',
  EXTERNAL_TOOL_FAILED: 'KILN_EXTERNAL_TOOL_FAILED',
  CLI_USAGE: 'KILN_CLI_USAGE',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class KilnError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'KilnError';
    this.code = code;
  }
}

export function createKilnError(code: ErrorCode, message: string): KilnError {
  return new KilnError(code, message);
}

export function isKilnError(err: unknown, code?: ErrorCode): err is KilnError {
  return err instanceof KilnError && (code === undefined || err.code === code);
}

// ============================================================================
// Categories
// ============================================================================

/** Manifest file missing or not parseable as TOML. */
export class ManifestError extends KilnError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = 'ManifestError';
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
  value?: unknown;
}

export class ValidationError extends KilnError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      ERROR_CODES.MANIFEST_INVALID,
      `Manifest validation failed:\n${issues.map((i) => `- ${i.field}: ${i.message}`).join('\n')}`
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/** Malformed conversion input: wrong shape, unknown layout, missing tensor. */
export class ConversionError extends KilnError {
  constructor(message: string) {
    super(ERROR_CODES.CONVERSION_INVALID, message);
    this.name = 'ConversionError';
  }
}

export class PayloadError extends KilnError {
  constructor(message: string) {
    super(ERROR_CODES.PAYLOAD_INVALID, message);
    this.name = 'PayloadError';
  }
}

export class GuestConfigError extends KilnError {
  constructor(message: string) {
    super(ERROR_CODES.GUEST_CONFIG_INVALID, message);
    this.name = 'GuestConfigError';
  }
}

/** Declared and derived addresses disagree, or slot/kind rules are broken. */
export class DerivationError extends KilnError {
  constructor(message: string) {
    super(ERROR_CODES.DERIVATION_FAILED, message);
    this.name = 'DerivationError';
  }
}

export class AccountsError extends KilnError {
  constructor(message: string) {
    super(ERROR_CODES.ACCOUNTS_INVALID, message);
    this.name = 'AccountsError';
  }
}

export class RegistryError extends KilnError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = 'RegistryError';
  }
}

export class KilnIOError extends KilnError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(ERROR_CODES.IO_FAILED, message);
    this.name = 'KilnIOError';
    this.path = path;
  }
}

/** Non-zero exit from an external tool. Output is kept verbatim. */
export class ExternalToolError extends KilnError {
  readonly command: string;
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, args: string[], exitCode: number | null, stdout: string, stderr: string) {
    const detail = [stderr.trim(), stdout.trim()].filter(Boolean).join('\n');
    super(
      ERROR_CODES.EXTERNAL_TOOL_FAILED,
      `${command} exited with ${exitCode === null ? 'signal' : `code ${exitCode}`}${detail ? `\n${detail}` : ''}`
    );
    this.name = 'ExternalToolError';
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}
