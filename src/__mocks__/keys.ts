import { generateKeyPairSync } from 'crypto';

/**
 * RSA key pair for signing app JWTs in tests. The private key is PKCS#1,
 * the format GitHub hands out.
 */
export const testKeys = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  publicKeyEncoding: { type: 'spki', format: 'pem' },
  privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
});
