import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
const KEY_BYTES = 32;
const IV_BYTES = 12;
const FORMAT_VERSION = 'v1';
const MASK_CHAR = '•';
const MAX_MASK_LENGTH = 12;

export class EncryptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncryptionError';
  }
}

function decodeKey(encryptionKey: string): Buffer | null {
  if (/^[0-9a-f]{64}$/i.test(encryptionKey)) {
    return Buffer.from(encryptionKey, 'hex');
  }
  const decoded = Buffer.from(encryptionKey, 'base64');
  return decoded.length === KEY_BYTES ? decoded : null;
}

export function isValidEncryptionKey(encryptionKey: string): boolean {
  return decodeKey(encryptionKey) !== null;
}

// ENCRYPTION_KEY when it decodes to 32 bytes, otherwise SHA-256 of SECRET_KEY.
export function deriveEncryptionKey(encryptionKey: string | null, secretKey: string): Buffer {
  const decoded = encryptionKey ? decodeKey(encryptionKey) : null;
  return decoded ?? createHash('sha256').update(secretKey).digest();
}

export function generateEncryptionKey(): string {
  return randomBytes(KEY_BYTES).toString('base64');
}

/**
 * Symmetric encryption for stored API keys.
 *
 * Output is `v1.<iv>.<tag>.<ciphertext>` (base64url parts). Empty input maps to
 * an empty string in both directions.
 */
export class KeyEncryption {
  private readonly key: Buffer;

  constructor(encryptionKey: string | null, secretKey: string) {
    this.key = deriveEncryptionKey(encryptionKey, secretKey);
  }

  encrypt(plaintext: string): string {
    if (!plaintext) return '';

    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return [FORMAT_VERSION, iv, tag, encrypted]
      .map((part) => (typeof part === 'string' ? part : part.toString('base64url')))
      .join('.');
  }

  decrypt(ciphertext: string): string {
    if (!ciphertext) return '';

    const [version, iv, tag, encrypted, ...rest] = ciphertext.split('.');
    if (version !== FORMAT_VERSION || !iv || !tag || encrypted === undefined || rest.length) {
      throw new EncryptionError('Invalid or corrupted encrypted data');
    }

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, Buffer.from(iv, 'base64url'));
      decipher.setAuthTag(Buffer.from(tag, 'base64url'));
      return Buffer.concat([
        decipher.update(Buffer.from(encrypted, 'base64url')),
        decipher.final(),
      ]).toString('utf8');
    } catch {
      throw new EncryptionError('Invalid or corrupted encrypted data');
    }
  }

  // "••••••••abcd" — at most 12 mask characters, then the last `visibleChars`.
  maskKey(key: string, visibleChars = 4): string {
    if (!key || key.length <= visibleChars) {
      return MASK_CHAR.repeat(8);
    }
    const maskedLength = Math.min(key.length - visibleChars, MAX_MASK_LENGTH);
    return MASK_CHAR.repeat(maskedLength) + key.slice(-visibleChars);
  }
}
