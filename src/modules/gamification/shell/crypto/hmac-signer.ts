/**
 * Gamification Module - Certificate Signer
 *
 * Shell-layer implementation of the CertificateSigner interface using Node.js crypto.
 */

import { createHash, createHmac, timingSafeEqual } from 'crypto';

import type { CertificateSigner } from '../../core/ports.js';

/**
 * HMAC-SHA256 signer keyed with the certificate secret.
 */
export const makeHmacCertificateSigner = (secret: string): CertificateSigner => {
  const sign = (payload: string): string =>
    createHmac('sha256', secret).update(payload).digest('hex');

  return {
    sign,

    verify(payload: string, signature: string): boolean {
      const expected = Buffer.from(sign(payload), 'utf-8');
      const actual = Buffer.from(signature, 'utf-8');
      return expected.length === actual.length && timingSafeEqual(expected, actual);
    },

    digest(payload: string): string {
      return createHash('sha256').update(payload).digest('hex');
    },
  };
};
