import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Hex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import {
  DecryptionError,
  InvalidInputError,
  NotFoundError,
  PermissionDeniedError,
  UpstreamError,
} from '../utils/errors';
import { KeyManager, parsePrivateKey } from '../wallet/KeyManager';
import { LocalKeyCipher } from '../wallet/LocalKeyCipher';
import { LocalObjectStore } from '../wallet/LocalObjectStore';
import { SecretLoader } from '../wallet/SecretLoader';
import { sealKey } from '../wallet/KeySealer';
import { InMemoryObjectStore } from './mocks/storage.mock';

const BUCKET = 'test-bucket';
const KMS_KEY = 'projects/test/locations/global/keyRings/test-ring/cryptoKeys/test-key';
const PRIVATE_KEY: Hex = `0x${'0'.repeat(63)}1`;
const OTHER_KEY: Hex = `0x${'0'.repeat(63)}2`;
const EXPECTED_ADDRESS = privateKeyToAccount(PRIVATE_KEY).address;

describe('LocalKeyCipher', () => {
  const cipher = new LocalKeyCipher('test-secret');

  it('decrypts back to the original plaintext', async () => {
    const plaintext = Buffer.from(PRIVATE_KEY, 'utf-8');
    const ciphertext = await cipher.encrypt(KMS_KEY, plaintext);

    expect(ciphertext.equals(plaintext)).toBe(false);
    expect((await cipher.decrypt(KMS_KEY, ciphertext)).toString('utf-8')).toBe(PRIVATE_KEY);
  });

  it('uses a fresh IV for every encryption', async () => {
    const plaintext = Buffer.from('same input');
    const a = await cipher.encrypt(KMS_KEY, plaintext);
    const b = await cipher.encrypt(KMS_KEY, plaintext);
    expect(a.equals(b)).toBe(false);
  });

  it('refuses a blob encrypted under a different key name', async () => {
    const ciphertext = await cipher.encrypt(KMS_KEY, Buffer.from('secret'));
    await expect(cipher.decrypt(`${KMS_KEY}-other`, ciphertext)).rejects.toThrow(DecryptionError);
  });

  it('refuses a blob encrypted with a different secret', async () => {
    const ciphertext = await new LocalKeyCipher('another-secret').encrypt(KMS_KEY, Buffer.from('secret'));
    await expect(cipher.decrypt(KMS_KEY, ciphertext)).rejects.toThrow(DecryptionError);
  });

  it('rejects truncated blobs', async () => {
    await expect(cipher.decrypt(KMS_KEY, Buffer.alloc(10))).rejects.toThrow('Ciphertext too short (10 bytes)');
  });
});

describe('parsePrivateKey', () => {
  it('accepts hex with and without 0x and surrounding whitespace', () => {
    expect(parsePrivateKey(Buffer.from(PRIVATE_KEY))).toBe(PRIVATE_KEY);
    expect(parsePrivateKey(Buffer.from(PRIVATE_KEY.slice(2)))).toBe(PRIVATE_KEY);
    expect(parsePrivateKey(Buffer.from(`  ${PRIVATE_KEY}\n`))).toBe(PRIVATE_KEY);
  });

  it('accepts 32 raw bytes', () => {
    expect(parsePrivateKey(Buffer.alloc(32, 0x11))).toBe(`0x${'11'.repeat(32)}`);
  });

  it('rejects anything else', () => {
    expect(() => parsePrivateKey(Buffer.from('not a key'))).toThrow(InvalidInputError);
    expect(() => parsePrivateKey(Buffer.from('0x1234'))).toThrow(InvalidInputError);
  });
});

describe('SecretLoader', () => {
  let store: InMemoryObjectStore;
  let cipher: LocalKeyCipher;
  let loader: SecretLoader;

  beforeEach(() => {
    store = new InMemoryObjectStore();
    cipher = new LocalKeyCipher('test-secret');
    loader = new SecretLoader(store, cipher, { bucket: BUCKET, kmsKeyName: KMS_KEY });
  });

  it('downloads and decrypts the named object', async () => {
    await store.upload(BUCKET, 'encrypted-key.enc', await cipher.encrypt(KMS_KEY, Buffer.from(PRIVATE_KEY)));
    expect((await loader.load('encrypted-key.enc')).toString('utf-8')).toBe(PRIVATE_KEY);
  });

  it('fails with NotFoundError when the object is absent', async () => {
    await expect(loader.load('missing.enc')).rejects.toThrow(NotFoundError);
  });

  it('fails with DecryptionError when KMS rejects the blob', async () => {
    const foreign = await cipher.encrypt(`${KMS_KEY}-other`, Buffer.from(PRIVATE_KEY));
    await store.upload(BUCKET, 'foreign.enc', foreign);

    const failure = loader.load('foreign.enc');
    await expect(failure).rejects.toThrow(DecryptionError);
    await expect(failure).rejects.toBeInstanceOf(PermissionDeniedError);
  });

  it('treats an empty object as undecryptable', async () => {
    await store.upload(BUCKET, 'empty.enc', Buffer.alloc(0));
    await expect(loader.load('empty.enc')).rejects.toThrow(`Encrypted key object gs://${BUCKET}/empty.enc is empty`);
  });

  it('wraps unexpected storage failures in UpstreamError', async () => {
    jest.spyOn(store, 'download').mockRejectedValue(new Error('socket hang up'));
    await expect(loader.load('encrypted-key.enc')).rejects.toThrow(UpstreamError);
    await expect(loader.load('encrypted-key.enc')).rejects.toThrow(
      `Download gs://${BUCKET}/encrypted-key.enc failed: socket hang up`
    );
  });
});

describe('KeyManager', () => {
  let store: InMemoryObjectStore;
  let cipher: LocalKeyCipher;
  let keys: KeyManager;

  const seal = (objectName: string, privateKey = PRIVATE_KEY) =>
    sealKey({ store, cipher, bucket: BUCKET, kmsKeyName: KMS_KEY, objectName, privateKey });

  beforeEach(() => {
    store = new InMemoryObjectStore();
    cipher = new LocalKeyCipher('test-secret');
    const loader = new SecretLoader(store, cipher, { bucket: BUCKET, kmsKeyName: KMS_KEY });
    keys = new KeyManager(loader, { defaultObjectName: 'encrypted-key.enc', prefix: 'keys/' });
  });

  it('lists nothing when the bucket holds no encrypted keys', async () => {
    await expect(keys.list()).resolves.toEqual([]);
  });

  it('lists only objects under the configured prefix', async () => {
    await seal('keys/alpha.enc');
    await seal('keys/beta.enc', OTHER_KEY);
    await seal('other/gamma.enc');

    await expect(keys.list()).resolves.toEqual(['keys/alpha.enc', 'keys/beta.enc']);
  });

  it('derives the address of the decrypted key', async () => {
    await seal('encrypted-key.enc');
    const loaded = await keys.load();

    expect(loaded.name).toBe('encrypted-key.enc');
    expect(loaded.address).toBe(EXPECTED_ADDRESS);
  });

  it('is idempotent: a second load returns the same address without decrypting again', async () => {
    await seal('keys/alpha.enc');
    const decrypt = jest.spyOn(cipher, 'decrypt');

    const first = await keys.load('keys/alpha.enc');
    const second = await keys.load('keys/alpha.enc');

    expect(second).toEqual(first);
    expect(decrypt).toHaveBeenCalledTimes(1);
  });

  it('serializes concurrent loads of the same key', async () => {
    await seal('keys/alpha.enc');
    const decrypt = jest.spyOn(cipher, 'decrypt');

    const [a, b] = await Promise.all([keys.load('keys/alpha.enc'), keys.load('keys/alpha.enc')]);

    expect(a.address).toBe(b.address);
    expect(decrypt).toHaveBeenCalledTimes(1);
  });

  it('reload decrypts again', async () => {
    await seal('keys/alpha.enc');
    const decrypt = jest.spyOn(cipher, 'decrypt');

    await keys.load('keys/alpha.enc');
    const again = await keys.reload('keys/alpha.enc');

    expect(again.address).toBe(EXPECTED_ADDRESS);
    expect(decrypt).toHaveBeenCalledTimes(2);
  });

  it('tracks the most recently loaded key as active', async () => {
    await seal('keys/alpha.enc');
    await seal('keys/beta.enc', OTHER_KEY);

    await keys.load('keys/alpha.enc');
    await keys.load('keys/beta.enc');

    expect(keys.address().address).toBe(privateKeyToAccount(OTHER_KEY).address);
    const cached = await keys.load('keys/alpha.enc');
    expect(cached.address).toBe(EXPECTED_ADDRESS);
    expect(keys.address().name).toBe('keys/alpha.enc');
  });

  it('reports NotFoundError before any key is loaded', () => {
    expect(() => keys.address()).toThrow('No key loaded');
  });

  it('leaves the active key unchanged when a load fails', async () => {
    await seal('keys/alpha.enc');
    await keys.load('keys/alpha.enc');

    await expect(keys.load('keys/missing.enc')).rejects.toThrow(NotFoundError);
    expect(keys.address().name).toBe('keys/alpha.enc');
  });

  it('rejects a decrypted payload that is not a private key', async () => {
    await store.upload(BUCKET, 'keys/garbage.enc', await cipher.encrypt(KMS_KEY, Buffer.from('hello world')));
    await expect(keys.load('keys/garbage.enc')).rejects.toThrow('Decrypted key is not a 32-byte EVM private key');
  });

  it('rejects names that climb out of the bucket', async () => {
    await expect(keys.load('../etc/passwd')).rejects.toThrow(InvalidInputError);
  });
});

describe('sealKey', () => {
  it('uploads a ciphertext that the key manager can load back', async () => {
    const store = new InMemoryObjectStore();
    const cipher = new LocalKeyCipher('test-secret');

    const sealed = await sealKey({
      store,
      cipher,
      bucket: BUCKET,
      kmsKeyName: KMS_KEY,
      objectName: 'encrypted-key.enc',
      privateKey: PRIVATE_KEY.slice(2),
    });
    expect(sealed.address).toBe(EXPECTED_ADDRESS);
    expect(sealed.bytes).toBe(32 + PRIVATE_KEY.length);

    const loader = new SecretLoader(store, cipher, { bucket: BUCKET, kmsKeyName: KMS_KEY });
    expect((await loader.load('encrypted-key.enc')).toString('utf-8')).toBe(PRIVATE_KEY);
  });

  it('refuses to upload something that is not a key', async () => {
    const store = new InMemoryObjectStore();
    await expect(
      sealKey({
        store,
        cipher: new LocalKeyCipher('test-secret'),
        bucket: BUCKET,
        kmsKeyName: KMS_KEY,
        objectName: 'encrypted-key.enc',
        privateKey: 'nope',
      })
    ).rejects.toThrow(InvalidInputError);
    expect(store.objects.size).toBe(0);
  });
});

describe('LocalObjectStore', () => {
  let root: string;
  let store: LocalObjectStore;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'enclave-keys-'));
    store = new LocalObjectStore(root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lists nothing for a bucket that does not exist yet', async () => {
    await expect(store.list(BUCKET)).resolves.toEqual([]);
  });

  it('stores objects under nested names and lists them by prefix', async () => {
    await store.upload(BUCKET, 'keys/alpha.enc', Buffer.from('a'));
    await store.upload(BUCKET, 'keys/beta.enc', Buffer.from('b'));
    await store.upload(BUCKET, 'readme.txt', Buffer.from('c'));

    await expect(store.list(BUCKET, 'keys/')).resolves.toEqual(['keys/alpha.enc', 'keys/beta.enc']);
    expect((await store.download(BUCKET, 'keys/beta.enc')).toString()).toBe('b');
  });

  it('fails with NotFoundError for a missing object', async () => {
    await expect(store.download(BUCKET, 'missing.enc')).rejects.toThrow(NotFoundError);
  });

  it('refuses paths outside the bucket', async () => {
    await expect(store.download(BUCKET, '../outside.enc')).rejects.toThrow(InvalidInputError);
  });
});
