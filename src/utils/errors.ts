/**
 * Error taxonomy shared by every component. Each error carries the HTTP
 * status the front-end answers with; the message is what the client sees.
 */

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends AppError {
  readonly statusCode: number = 400;
  readonly code: string = 'INVALID_INPUT';
}

export class InvalidAddressError extends InvalidInputError {
  readonly code = 'INVALID_ADDRESS';

  constructor(readonly address: string) {
    super(`Invalid EVM address: ${address}`);
  }
}

export class PermissionDeniedError extends AppError {
  readonly statusCode: number = 403;
  readonly code: string = 'PERMISSION_DENIED';
}

/** KMS refused the ciphertext: wrong key, missing IAM binding or corrupt blob. */
export class DecryptionError extends PermissionDeniedError {
  readonly code = 'DECRYPTION_FAILED';
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';
}

export class ConnectionError extends AppError {
  readonly statusCode = 503;
  readonly code = 'CONNECTION_ERROR';
}

export class RpcError extends AppError {
  readonly statusCode = 502;
  readonly code = 'RPC_ERROR';
}

export class UpstreamError extends AppError {
  readonly statusCode = 502;
  readonly code = 'UPSTREAM_ERROR';
}

export class ConfigError extends AppError {
  readonly statusCode = 500;
  readonly code = 'CONFIG_ERROR';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
