import { AppError, DecryptionError, UpstreamError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { KeyCipher, ObjectStore } from './KeyStore';

export interface SecretLoaderOptions {
  bucket: string;
  kmsKeyName: string;
}

/**
 * Downloads a KMS ciphertext from the input bucket and decrypts it. No retry:
 * failures surface as NotFoundError, DecryptionError/PermissionDeniedError or
 * UpstreamError.
 */
export class SecretLoader {
  constructor(
    private readonly store: ObjectStore,
    private readonly cipher: KeyCipher,
    private readonly options: SecretLoaderOptions
  ) {}

  get bucket(): string {
    return this.options.bucket;
  }

  async list(prefix = ''): Promise<string[]> {
    try {
      return await this.store.list(this.options.bucket, prefix);
    } catch (err) {
      throw asAppError(err, 'List encrypted objects');
    }
  }

  async load(objectName: string): Promise<Buffer> {
    const source = `gs://${this.options.bucket}/${objectName}`;
    logger.info(`[Secrets] Downloading encrypted key from ${source}`);

    let ciphertext: Buffer;
    try {
      ciphertext = await this.store.download(this.options.bucket, objectName);
    } catch (err) {
      throw asAppError(err, `Download ${source}`);
    }
    if (ciphertext.length === 0) {
      throw new DecryptionError(`Encrypted key object ${source} is empty`);
    }
    logger.info(`[Secrets] Downloaded encrypted key (${ciphertext.length} bytes)`);

    let plaintext: Buffer;
    try {
      plaintext = await this.cipher.decrypt(this.options.kmsKeyName, ciphertext);
    } catch (err) {
      throw asAppError(err, `Decrypt ${source}`);
    }
    logger.info(`[Secrets] Key decrypted (${plaintext.length} bytes) with ${this.options.kmsKeyName}`);
    return plaintext;
  }
}

function asAppError(err: unknown, action: string): AppError {
  if (err instanceof AppError) return err;
  return new UpstreamError(`${action} failed: ${errorMessage(err)}`, { cause: err });
}
