/**
 * Gamification Module - Ports (Interfaces)
 *
 * Collaborators the engine depends on.
 * These define WHAT we need, not HOW it's implemented.
 */

import type { GamificationError } from './errors.js';
import type { UserProgress } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Progress Store
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Synchronous persistence for the single local progress record.
 */
export interface ProgressStore {
  /** Where the record lives (file path for the JSON store) */
  readonly location: string;

  /**
   * Load the persisted record.
   * Returns null when nothing has been saved yet.
   */
  load(): Result<UserProgress | null, GamificationError>;

  /** Replace the persisted record */
  save(progress: UserProgress): Result<void, GamificationError>;

  /** Delete the persisted record (no-op when absent) */
  reset(): Result<void, GamificationError>;

  /**
   * Copy the persisted record next to itself.
   * @returns Location of the backup
   */
  backup(name?: string): Result<string, GamificationError>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Certificate Signing
// ─────────────────────────────────────────────────────────────────────────────

export interface CertificateSigner {
  /** Hex-encoded keyed signature of the payload */
  sign(payload: string): string;
  /** Constant-time check of a signature produced by sign() */
  verify(payload: string, signature: string): boolean;
  /** Hex-encoded SHA-256 digest of the payload */
  digest(payload: string): string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Quest Verification
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Predicate deciding whether a quest's real-world condition holds.
 */
export type QuestVerifier = (progress: Readonly<UserProgress>) => boolean;

/** Verifiers keyed by quest id */
export type QuestVerifiers = Readonly<Record<string, QuestVerifier>>;
