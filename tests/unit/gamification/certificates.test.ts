/**
 * Course Certificate Tests
 */

import { describe, it, expect } from 'vitest';

import {
  canonicalJson,
  createCertificate,
  decodeCertificate,
  encodeCertificate,
  formatCertificateMarkdown,
  hasEarnedCertificate,
  verifyCertificate,
  type Certificate,
} from '@/modules/gamification/core/certificates.js';
import { makeHmacCertificateSigner } from '@/modules/gamification/shell/crypto/hmac-signer.js';

import { createTestProgress, testSigner } from '../../fixtures/fakes.js';

const ISSUED_AT = new Date(2024, 2, 10, 12);
const ISSUED_AT_SECONDS = Math.floor(ISSUED_AT.getTime() / 1000);

const issue = (overrides: Parameters<typeof createTestProgress>[0] = {}): Certificate =>
  createCertificate(createTestProgress({ xp: 250, level: 2, ...overrides }), 'quackverse-basics', {
    signer: testSigner,
    courseName: 'QuackVerse Basics',
    now: ISSUED_AT,
  })._unsafeUnwrap();

describe('canonicalJson', () => {
  it('sorts keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [true, null], c: 'x' } })).toBe(
      '{"a":{"c":"x","d":[true,null]},"b":1}'
    );
  });
});

describe('createCertificate', () => {
  it('issues a certificate for the current standing', () => {
    const certificate = issue();

    expect(certificate).toMatchObject({
      version: '1.0',
      type: 'course-completion',
      id: `digest(test-user:quackverse-basics:${String(ISSUED_AT_SECONDS)})`,
      courseId: 'quackverse-basics',
      courseName: 'QuackVerse Basics',
      issuer: 'QuackVerse',
      recipient: 'test-user',
      issuedAt: ISSUED_AT_SECONDS,
      issuedDate: '2024-03-10',
      xp: 250,
      level: 2,
    });
    expect(verifyCertificate(certificate, testSigner)).toBe(true);
  });

  it('defaults the course name to the course id and accepts an issuer', () => {
    const certificate = createCertificate(createTestProgress(), 'rust-101', {
      signer: testSigner,
      issuer: 'Duck Academy',
      now: ISSUED_AT,
    })._unsafeUnwrap();

    expect(certificate.courseName).toBe('rust-101');
    expect(certificate.issuer).toBe('Duck Academy');
  });

  it('requires a username', () => {
    const result = createCertificate(createTestProgress({ githubUsername: '  ' }), 'course', {
      signer: testSigner,
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'CertificateError',
      message: 'User must have a GitHub username to create a certificate',
    });
  });

  it('requires a course id', () => {
    const result = createCertificate(createTestProgress(), '', { signer: testSigner });

    expect(result._unsafeUnwrapErr().message).toBe('Course id must not be empty');
  });
});

describe('verifyCertificate', () => {
  it('rejects a certificate whose fields were changed', () => {
    const certificate = issue();

    expect(verifyCertificate({ ...certificate, xp: 9000 }, testSigner)).toBe(false);
  });

  it('works with the HMAC signer', () => {
    const signer = makeHmacCertificateSigner('test-secret');
    const certificate = createCertificate(createTestProgress({ xp: 40 }), 'quackverse-basics', {
      signer,
      now: ISSUED_AT,
    })._unsafeUnwrap();

    expect(certificate.signature).toMatch(/^[0-9a-f]{64}$/);
    expect(certificate.id).toMatch(/^[0-9a-f]{64}$/);
    expect(verifyCertificate(certificate, signer)).toBe(true);
    expect(verifyCertificate(certificate, makeHmacCertificateSigner('other-secret'))).toBe(false);
    expect(verifyCertificate({ ...certificate, recipient: 'mallory' }, signer)).toBe(false);
  });
});

describe('hasEarnedCertificate', () => {
  it('checks quests and XP for courses with requirements', () => {
    const quests = ['star-quackcore', 'run-ducktyper', 'complete-tutorial'];

    expect(
      hasEarnedCertificate(createTestProgress({ completedQuestIds: quests, xp: 100 }), 'quackverse-basics')
    ).toBe(true);
    expect(
      hasEarnedCertificate(createTestProgress({ completedQuestIds: quests, xp: 99 }), 'quackverse-basics')
    ).toBe(false);
    expect(
      hasEarnedCertificate(
        createTestProgress({ completedQuestIds: quests.slice(1), xp: 500 }),
        'quackverse-basics'
      )
    ).toBe(false);
  });

  it('checks the course completion event for other courses', () => {
    const progress = createTestProgress({ completedEventIds: ['academy-course-rust-101'] });

    expect(hasEarnedCertificate(progress, 'rust-101')).toBe(true);
    expect(hasEarnedCertificate(progress, 'go-101')).toBe(false);
  });
});

describe('encodeCertificate / decodeCertificate', () => {
  it('decodes what it encodes', () => {
    const certificate = issue();

    expect(decodeCertificate(encodeCertificate(certificate))._unsafeUnwrap()).toEqual(certificate);
  });

  it('rejects a string that is not JSON', () => {
    const result = decodeCertificate('not a certificate');

    expect(result._unsafeUnwrapErr().message).toBe('Invalid certificate string');
  });

  it('rejects JSON of the wrong shape', () => {
    const encoded = Buffer.from(JSON.stringify({ version: '1.0' }), 'utf-8').toString('base64');

    const result = decodeCertificate(encoded);

    expect(result._unsafeUnwrapErr().message).toMatch(/^Invalid certificate string: /);
  });
});

describe('formatCertificateMarkdown', () => {
  it('renders the certificate', () => {
    expect(formatCertificateMarkdown(issue())).toBe(
      [
        '# Certificate of Completion',
        '',
        '**Course:** QuackVerse Basics',
        '**Issued To:** test-user',
        '**Issued By:** QuackVerse',
        '**Date:** 2024-03-10',
        '**Verification ID:** digest(t...',
        '',
        'This certificate verifies that **test-user** has successfully completed the **QuackVerse Basics** course.',
        '',
        'Level achieved: 2',
        'XP earned: 250',
        '',
      ].join('\n')
    );
  });
});
