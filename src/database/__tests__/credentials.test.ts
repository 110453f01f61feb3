/**
 * Credential Verifier Tests
 */

import { describe, it, expect } from 'vitest';

import { CredentialVerifier } from '../credentials.js';

describe('CredentialVerifier', () => {
  const verifier = new CredentialVerifier(4);

  it('hashes with bcrypt at the configured cost', () => {
    const hash = verifier.hash('test-password');

    expect(hash).toMatch(/^\$2[aby]\$04\$/);
    expect(hash).toHaveLength(60);
  });

  it('salts every hash', () => {
    expect(verifier.hash('test-password')).not.toBe(verifier.hash('test-password'));
  });

  it('verifies the matching password', () => {
    const hash = verifier.hash('test-password');

    expect(verifier.verify('test-password', hash)).toBe(true);
    expect(verifier.verify('wrong-password', hash)).toBe(false);
  });

  it('rejects when there is no stored hash', () => {
    expect(verifier.verify('test-password', undefined)).toBe(false);
  });

  it('rejects a stored value that is not a bcrypt hash', () => {
    expect(verifier.verify('test-password', 'test-password')).toBe(false);
  });

  it('distinguishes passwords that differ after 72 bytes', () => {
    const prefix = 'x'.repeat(72);
    const hash = verifier.hash(`${prefix}correct-tail`);

    expect(verifier.verify(`${prefix}WRONG`, hash)).toBe(false);
    expect(verifier.verify(`${prefix}correct-tail`, hash)).toBe(true);
  });

  it('distinguishes multi-byte passwords past the bcrypt limit', () => {
    const prefix = 'é'.repeat(40);
    const hash = verifier.hash(`${prefix}a`);

    expect(verifier.verify(`${prefix}b`, hash)).toBe(false);
  });

  it('flags hashes made at another cost', () => {
    expect(verifier.needsRehash(verifier.hash('test-password'))).toBe(false);
    expect(verifier.needsRehash(new CredentialVerifier(5).hash('test-password'))).toBe(true);
  });
});
