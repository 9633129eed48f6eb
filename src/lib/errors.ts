/**
 * Error classes for the cluster configuration engine
 *
 * Semantic validation problems are never thrown: they are returned as
 * diagnostics. The classes here cover the two other failure modes, a document
 * that cannot be turned into a configuration object at all, and an internal
 * invariant breach.
 */

/**
 * Error codes for structural (pre-validation) failures
 */
export const ErrorCodes = {
  DOCUMENT_UNREADABLE: 'DOCUMENT_UNREADABLE',
  DOCUMENT_TOO_LARGE: 'DOCUMENT_TOO_LARGE',
  DOCUMENT_UNPARSEABLE: 'DOCUMENT_UNPARSEABLE',
  DOCUMENT_SHAPE: 'DOCUMENT_SHAPE',
  ENGINE_INVARIANT: 'ENGINE_INVARIANT',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class carrying a code and optional details
 */
export class ClusterConfigError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ClusterConfigError';
    this.code = code;
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export type StructuralErrorCode = Exclude<ErrorCode, 'ENGINE_INVARIANT'>;

/**
 * The input could not be decoded into a configuration document
 */
export class StructuralError extends ClusterConfigError {
  public override readonly code: StructuralErrorCode;

  constructor(message: string, code: StructuralErrorCode, details: Record<string, unknown> = {}) {
    super(message, code, details);
    this.name = 'StructuralError';
    this.code = code;
  }
}

/**
 * A canonical configuration failed its own output contract.
 * Indicates a defect in the registry or the normalizer, not in user input.
 */
export class EngineInvariantError extends ClusterConfigError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, ErrorCodes.ENGINE_INVARIANT, details);
    this.name = 'EngineInvariantError';
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
