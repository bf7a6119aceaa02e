/** Blob storage holding KMS ciphertexts, e.g. a Cloud Storage bucket. */
export interface ObjectStore {
  download(bucket: string, name: string): Promise<Buffer>;
  list(bucket: string, prefix?: string): Promise<string[]>;
  upload(bucket: string, name: string, data: Buffer): Promise<void>;
}

/** Envelope for a KMS key resource (`projects/…/cryptoKeys/…`). */
export interface KeyCipher {
  encrypt(keyName: string, plaintext: Buffer): Promise<Buffer>;
  decrypt(keyName: string, ciphertext: Buffer): Promise<Buffer>;
}

export interface LoadedKey {
  name: string;
  address: string;
  loadedAt: string;
}

/** Status code carried by Google API errors: HTTP for Storage, gRPC for KMS. */
export function errorCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}
