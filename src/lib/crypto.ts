import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes } from 'crypto';
import {
  SALT_SIZE,
  NONCE_SIZE,
  TAG_SIZE,
  HEADER_SIZE,
  KEY_SIZE,
  PBKDF2_ITERATIONS,
  PBKDF2_DIGEST,
} from '../types';
import { AuthenticationError, FormatError } from './errors';

const CIPHER = 'aes-256-gcm';

export type Passphrase = string | Buffer;

/**
 * Derive a 32-byte key from a passphrase and a 16-byte salt (PBKDF2-HMAC-SHA256)
 */
export function deriveKey(passphrase: Passphrase, salt: Buffer): Buffer {
  if (salt.length !== SALT_SIZE) {
    throw new Error(`Invalid salt size: expected ${SALT_SIZE}, got ${salt.length}`);
  }
  return pbkdf2Sync(passphrase, salt, PBKDF2_ITERATIONS, KEY_SIZE, PBKDF2_DIGEST);
}

/**
 * Encrypt plaintext under a passphrase using AES-256-GCM
 *
 * Output format:
 * - Bytes 0-15: PBKDF2 salt
 * - Bytes 16-27: GCM nonce
 * - Bytes 28+: ciphertext followed by the 16-byte tag
 */
export function seal(plaintext: Buffer, passphrase: Passphrase): Buffer {
  const salt = randomBytes(SALT_SIZE);
  const nonce = randomBytes(NONCE_SIZE);
  const key = deriveKey(passphrase, salt);

  try {
    const cipher = createCipheriv(CIPHER, key, nonce);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([salt, nonce, ciphertext, cipher.getAuthTag()]);
  } finally {
    key.fill(0);
  }
}

/**
 * Decrypt an envelope produced by seal(). Nothing is returned unless the tag verifies.
 */
export function open(envelope: Buffer, passphrase: Passphrase): Buffer {
  if (envelope.length < HEADER_SIZE) {
    throw new FormatError(
      `Invalid envelope: expected at least ${HEADER_SIZE} header bytes, got ${envelope.length}`
    );
  }
  if (envelope.length < HEADER_SIZE + TAG_SIZE) {
    throw new FormatError('Invalid envelope: authentication tag is missing');
  }

  const salt = envelope.subarray(0, SALT_SIZE);
  const nonce = envelope.subarray(SALT_SIZE, HEADER_SIZE);
  const ciphertext = envelope.subarray(HEADER_SIZE, envelope.length - TAG_SIZE);
  const tag = envelope.subarray(envelope.length - TAG_SIZE);

  const key = deriveKey(passphrase, salt);

  try {
    const decipher = createDecipheriv(CIPHER, key, nonce);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new AuthenticationError();
  } finally {
    key.fill(0);
  }
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode base64 text, rejecting anything Buffer.from would silently skip.
 * Line breaks are allowed (the contents API wraps at 60 columns).
 */
export function decodeBase64(text: string): Buffer {
  const compact = text.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new FormatError('Invalid payload: not valid base64');
  }
  return Buffer.from(compact, 'base64');
}
