import { privateKeyToAccount } from 'viem/accounts';
import { DecryptionError } from '../utils/errors';
import { logger } from '../utils/logger';
import { KeyCipher, ObjectStore } from './KeyStore';
import { parsePrivateKey } from './KeyManager';

export interface SealRequest {
  store: ObjectStore;
  cipher: KeyCipher;
  bucket: string;
  kmsKeyName: string;
  objectName: string;
  privateKey: string;
}

export interface SealedKey {
  objectName: string;
  address: string;
  bytes: number;
}

/**
 * Operator side of the key flow: encrypt a private key with the KMS key,
 * prove it decrypts back, then upload the ciphertext to the input bucket.
 */
export async function sealKey(req: SealRequest): Promise<SealedKey> {
  const privateKey = parsePrivateKey(Buffer.from(req.privateKey, 'utf-8'));
  const plaintext = Buffer.from(privateKey, 'utf-8');
  const ciphertext = await req.cipher.encrypt(req.kmsKeyName, plaintext);

  const check = await req.cipher.decrypt(req.kmsKeyName, ciphertext);
  if (!check.equals(plaintext)) {
    throw new DecryptionError('Round-trip check failed: ciphertext does not decrypt to the original key');
  }

  await req.store.upload(req.bucket, req.objectName, ciphertext);
  const address = privateKeyToAccount(privateKey).address;
  logger.info(`[Secrets] Uploaded ${ciphertext.length} bytes to ${req.bucket}/${req.objectName} for ${address}`);
  return { objectName: req.objectName, address, bytes: ciphertext.length };
}
