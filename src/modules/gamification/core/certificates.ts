/**
 * Gamification Module - Course Certificates
 *
 * Signed course-completion certificates. The signature is a keyed hash of the
 * canonical JSON (sorted keys) of every field except `signature`.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { createCertificateError, type CertificateError } from './errors.js';
import { hasCompletedEvent, hasCompletedQuest } from './progress.js';
import { toIsoDate } from './streak.js';

import type { CertificateSigner } from './ports.js';
import type { JsonValue, UserProgress } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

export const CERTIFICATE_VERSION = '1.0';
export const DEFAULT_CERTIFICATE_ISSUER = 'QuackVerse';

export const CertificateSchema = Type.Object({
  version: Type.Literal(CERTIFICATE_VERSION),
  type: Type.Literal('course-completion'),
  id: Type.String({ minLength: 1 }),
  courseId: Type.String({ minLength: 1 }),
  courseName: Type.String(),
  issuer: Type.String(),
  recipient: Type.String({ minLength: 1 }),
  /** Unix seconds */
  issuedAt: Type.Integer({ minimum: 0 }),
  /** YYYY-MM-DD */
  issuedDate: Type.String(),
  xp: Type.Integer({ minimum: 0 }),
  level: Type.Integer({ minimum: 0 }),
  signature: Type.String(),
});

export type Certificate = Static<typeof CertificateSchema>;

export type UnsignedCertificate = Omit<Certificate, 'signature'>;

export interface CreateCertificateOptions {
  signer: CertificateSigner;
  issuer?: string;
  /** Defaults to the course id */
  courseName?: string;
  now?: Date;
}

/**
 * Course-specific requirements beyond finishing the course itself.
 */
const COURSE_REQUIREMENTS: Readonly<Record<string, { quests: string[]; minXp: number }>> = {
  'quackverse-basics': {
    quests: ['star-quackcore', 'run-ducktyper', 'complete-tutorial'],
    minXp: 100,
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Canonical JSON
// ─────────────────────────────────────────────────────────────────────────────

/**
 * JSON with object keys sorted at every depth.
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key] ?? null)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

const signingPayload = (certificate: UnsignedCertificate): string => {
  const fields: Record<string, JsonValue> = { ...certificate };
  return canonicalJson(fields);
};

// ─────────────────────────────────────────────────────────────────────────────
// Issue & Verify
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Issues a certificate for the user's current standing.
 */
export function createCertificate(
  progress: Readonly<UserProgress>,
  courseId: string,
  options: CreateCertificateOptions
): Result<Certificate, CertificateError> {
  const recipient = progress.githubUsername.trim();
  if (recipient === '') {
    return err(createCertificateError('User must have a GitHub username to create a certificate'));
  }
  if (courseId.trim() === '') {
    return err(createCertificateError('Course id must not be empty'));
  }

  const now = options.now ?? new Date();
  const issuedAt = Math.floor(now.getTime() / 1000);

  const unsigned: UnsignedCertificate = {
    version: CERTIFICATE_VERSION,
    type: 'course-completion',
    id: options.signer.digest(`${recipient}:${courseId}:${String(issuedAt)}`),
    courseId,
    courseName: options.courseName ?? courseId,
    issuer: options.issuer ?? DEFAULT_CERTIFICATE_ISSUER,
    recipient,
    issuedAt,
    issuedDate: toIsoDate(now),
    xp: progress.xp,
    level: progress.level,
  };

  return ok({ ...unsigned, signature: options.signer.sign(signingPayload(unsigned)) });
}

/**
 * True if the certificate carries the signature the signer would produce.
 */
export function verifyCertificate(certificate: Certificate, signer: CertificateSigner): boolean {
  const { signature, ...unsigned } = certificate;
  return signer.verify(signingPayload(unsigned), signature);
}

/**
 * Whether the user qualifies for a course certificate.
 */
export function hasEarnedCertificate(progress: Readonly<UserProgress>, courseId: string): boolean {
  const requirements = COURSE_REQUIREMENTS[courseId];
  if (requirements !== undefined) {
    return (
      requirements.quests.every((questId) => hasCompletedQuest(progress, questId)) &&
      progress.xp >= requirements.minXp
    );
  }
  return hasCompletedEvent(progress, `academy-course-${courseId}`);
}

// ─────────────────────────────────────────────────────────────────────────────
// Sharing
// ─────────────────────────────────────────────────────────────────────────────

export const encodeCertificate = (certificate: Certificate): string =>
  Buffer.from(JSON.stringify(certificate), 'utf-8').toString('base64');

export function decodeCertificate(encoded: string): Result<Certificate, CertificateError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded.trim(), 'base64').toString('utf-8'));
  } catch {
    return err(createCertificateError('Invalid certificate string'));
  }

  if (!Value.Check(CertificateSchema, parsed)) {
    const first = Value.Errors(CertificateSchema, parsed).First();
    const detail = first !== undefined ? `: ${first.path} ${first.message}` : '';
    return err(createCertificateError(`Invalid certificate string${detail}`));
  }

  return ok(parsed);
}

export function formatCertificateMarkdown(certificate: Certificate): string {
  const { courseName, recipient, issuedDate, level, xp } = certificate;

  return [
    '# Certificate of Completion',
    '',
    `**Course:** ${courseName}`,
    `**Issued To:** ${recipient}`,
    `**Issued By:** ${certificate.issuer}`,
    `**Date:** ${issuedDate}`,
    `**Verification ID:** ${certificate.id.slice(0, 8)}...`,
    '',
    `This certificate verifies that **${recipient}** has successfully completed the **${courseName}** course.`,
    '',
    `Level achieved: ${String(level)}`,
    `XP earned: ${String(xp)}`,
    '',
  ].join('\n');
}
