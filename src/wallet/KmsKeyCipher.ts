import { KeyManagementServiceClient } from '@google-cloud/kms';
import { DecryptionError, NotFoundError, UpstreamError, errorMessage } from '../utils/errors';
import { KeyCipher, errorCode } from './KeyStore';

// gRPC status codes
const INVALID_ARGUMENT = 3;
const NOT_FOUND = 5;
const PERMISSION_DENIED = 7;
const FAILED_PRECONDITION = 9;
const UNAUTHENTICATED = 16;

export class KmsKeyCipher implements KeyCipher {
  private client = new KeyManagementServiceClient();

  async encrypt(keyName: string, plaintext: Buffer): Promise<Buffer> {
    try {
      const [result] = await this.client.encrypt({ name: keyName, plaintext });
      return toBuffer(result.ciphertext, 'ciphertext');
    } catch (err) {
      throw this.translate(err, keyName, 'encrypt');
    }
  }

  async decrypt(keyName: string, ciphertext: Buffer): Promise<Buffer> {
    try {
      const [result] = await this.client.decrypt({ name: keyName, ciphertext });
      return toBuffer(result.plaintext, 'plaintext');
    } catch (err) {
      throw this.translate(err, keyName, 'decrypt');
    }
  }

  private translate(err: unknown, keyName: string, op: 'encrypt' | 'decrypt'): Error {
    if (err instanceof UpstreamError) return err;
    switch (errorCode(err)) {
      case NOT_FOUND:
        return new NotFoundError(`KMS key not found: ${keyName}`, { cause: err });
      case INVALID_ARGUMENT:
      case PERMISSION_DENIED:
      case FAILED_PRECONDITION:
      case UNAUTHENTICATED:
        return new DecryptionError(`KMS ${op} rejected for ${keyName}: ${errorMessage(err)}`, { cause: err });
      default:
        return new UpstreamError(`KMS ${op} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function toBuffer(value: string | Uint8Array | null | undefined, field: string): Buffer {
  if (value === null || value === undefined) throw new UpstreamError(`KMS response has no ${field}`);
  return typeof value === 'string' ? Buffer.from(value, 'base64') : Buffer.from(value);
}
