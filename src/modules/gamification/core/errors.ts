/**
 * Gamification Module - Domain Errors
 *
 * Error types for progress persistence and certificates.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Interfaces
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reading or writing the progress file failed.
 */
export interface PersistenceError {
  readonly type: 'PersistenceError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

/**
 * The progress file exists but does not hold a valid record.
 */
export interface ProgressParseError {
  readonly type: 'ProgressParseError';
  readonly message: string;
  readonly path: string;
  readonly details: string[];
}

/**
 * A certificate could not be issued or decoded.
 */
export interface CertificateError {
  readonly type: 'CertificateError';
  readonly message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type GamificationError = PersistenceError | ProgressParseError | CertificateError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createPersistenceError = (
  message: string,
  path: string,
  cause?: unknown
): PersistenceError => ({
  type: 'PersistenceError',
  message,
  path,
  cause,
});

export const createProgressParseError = (
  message: string,
  path: string,
  details: string[] = []
): ProgressParseError => ({
  type: 'ProgressParseError',
  message,
  path,
  details,
});

export const createCertificateError = (message: string): CertificateError => ({
  type: 'CertificateError',
  message,
});

/**
 * Thrown when an XP event breaks the engine's input contract
 * (negative, fractional or unsafe points, XP overflow, empty id).
 */
export class InvalidXPEventError extends Error {
  constructor(
    public readonly eventId: string,
    reason: string
  ) {
    super(`Invalid XP event '${eventId}': ${reason}`);
    this.name = 'InvalidXPEventError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const GAMIFICATION_ERROR_HTTP_STATUS: Record<GamificationError['type'], number> = {
  PersistenceError: 500,
  ProgressParseError: 500,
  CertificateError: 400,
};

export const getHttpStatusForError = (error: GamificationError): number => {
  return GAMIFICATION_ERROR_HTTP_STATUS[error.type];
};
