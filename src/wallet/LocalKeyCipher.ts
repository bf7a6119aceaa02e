/**
 * LocalKeyCipher.ts
 * Stand-in for Cloud KMS when running outside Google Cloud.
 *
 *  - AES-256-GCM via Node's built-in crypto, key derived from a secret with SHA-256
 *  - every blob gets a unique random IV
 *  - the KMS key name is bound as additional authenticated data, so a blob
 *    only decrypts under the key name it was encrypted for
 */

import * as crypto from 'crypto';
import { DecryptionError } from '../utils/errors';
import { KeyCipher } from './KeyStore';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const TAG_LENGTH = 16;

export class LocalKeyCipher implements KeyCipher {
  private encryptionKey: Buffer;

  constructor(secret: string) {
    this.encryptionKey = crypto.createHash('sha256').update(secret).digest();
  }

  async encrypt(keyName: string, plaintext: Buffer): Promise<Buffer> {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.encryptionKey, iv);
    cipher.setAAD(Buffer.from(keyName, 'utf-8'));
    const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    // Blob format: iv(16) | authTag(16) | ciphertext
    return Buffer.concat([iv, cipher.getAuthTag(), encrypted]);
  }

  async decrypt(keyName: string, ciphertext: Buffer): Promise<Buffer> {
    if (ciphertext.length <= IV_LENGTH + TAG_LENGTH) {
      throw new DecryptionError(`Ciphertext too short (${ciphertext.length} bytes)`);
    }
    const iv = ciphertext.subarray(0, IV_LENGTH);
    const authTag = ciphertext.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const body = ciphertext.subarray(IV_LENGTH + TAG_LENGTH);

    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.encryptionKey, iv);
      decipher.setAAD(Buffer.from(keyName, 'utf-8'));
      decipher.setAuthTag(authTag);
      return Buffer.concat([decipher.update(body), decipher.final()]);
    } catch (err) {
      throw new DecryptionError(`Decryption with ${keyName} failed`, { cause: err });
    }
  }
}
