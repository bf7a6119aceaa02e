/**
 * KeyManager.ts
 * Owns the decrypted private keys for the lifetime of the process.
 *
 * Security model:
 *  - Ciphertexts live in the input bucket, encrypted with a KMS key.
 *  - Plaintext exists only in this object; it is never persisted, logged,
 *    or returned. Callers see the derived address.
 *  - Loads are serialized, so concurrent requests never race on the key slot.
 */

import { Hex } from 'viem';
import { PrivateKeyAccount, privateKeyToAccount } from 'viem/accounts';
import { InvalidInputError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { SerialQueue } from '../utils/SerialQueue';
import { metrics } from '../metrics/Metrics';
import { LoadedKey } from './KeyStore';
import { SecretLoader } from './SecretLoader';

export interface KeyManagerOptions {
  defaultObjectName: string;
  prefix?: string;
}

interface HeldKey {
  meta: LoadedKey;
  account: PrivateKeyAccount;
}

const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const RAW_KEY_LENGTH = 32;

function isPrivateKeyHex(value: string): value is Hex {
  return PRIVATE_KEY_PATTERN.test(value);
}

/** Accepts hex text (with or without 0x, surrounding whitespace) or 32 raw bytes. */
export function parsePrivateKey(plaintext: Buffer): Hex {
  const text = plaintext.toString('utf-8').trim();
  const candidate = text.startsWith('0x') || text.startsWith('0X') ? `0x${text.slice(2)}` : `0x${text}`;
  if (isPrivateKeyHex(candidate)) return candidate;
  if (plaintext.length === RAW_KEY_LENGTH) {
    const raw = `0x${plaintext.toString('hex')}`;
    if (isPrivateKeyHex(raw)) return raw;
  }
  throw new InvalidInputError('Decrypted key is not a 32-byte EVM private key');
}

export class KeyManager {
  private keys: Map<string, HeldKey> = new Map();
  private activeName: string | null = null;
  private queue = new SerialQueue();

  constructor(
    private readonly loader: SecretLoader,
    private readonly options: KeyManagerOptions
  ) {}

  /** Names of the encrypted key objects in the input bucket; empty when there are none. */
  async list(): Promise<string[]> {
    return this.loader.list(this.options.prefix ?? '');
  }

  /**
   * Decrypts a key object and makes it the active key. A name that is
   * already loaded is served from memory without another KMS call.
   */
  async load(name?: string): Promise<LoadedKey> {
    const objectName = this.resolveName(name);
    return this.queue.run(async () => {
      const held = this.keys.get(objectName) ?? (await this.decrypt(objectName));
      this.activeName = objectName;
      return { ...held.meta };
    });
  }

  /** Drops the cached copy and decrypts again. */
  async reload(name?: string): Promise<LoadedKey> {
    const objectName = this.resolveName(name);
    return this.queue.run(async () => {
      this.keys.delete(objectName);
      const held = await this.decrypt(objectName);
      this.activeName = objectName;
      return { ...held.meta };
    });
  }

  /** The active key, or NotFoundError when nothing is loaded. */
  address(): LoadedKey {
    const held = this.activeName ? this.keys.get(this.activeName) : undefined;
    if (!held) throw new NotFoundError('No key loaded');
    return { ...held.meta };
  }

  private async decrypt(objectName: string): Promise<HeldKey> {
    const plaintext = await this.loader.load(objectName);
    let privateKey: Hex;
    try {
      privateKey = parsePrivateKey(plaintext);
    } finally {
      plaintext.fill(0);
    }
    const account = privateKeyToAccount(privateKey);
    const held: HeldKey = {
      account,
      meta: { name: objectName, address: account.address, loadedAt: new Date().toISOString() },
    };
    this.keys.set(objectName, held);
    metrics.incKeyLoad();
    logger.info(`[Keys] Loaded ${objectName} → ${account.address}`);
    return held;
  }

  private resolveName(name?: string): string {
    const objectName = (name ?? '').trim() || this.options.defaultObjectName;
    if (objectName.includes('..')) throw new InvalidInputError(`Invalid key name: ${objectName}`);
    return objectName;
  }
}
