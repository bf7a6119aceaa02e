/**
 * encryptKey.ts
 * Encrypts an EVM private key with the configured KMS key and uploads it to
 * the input bucket, where the server's key manager picks it up.
 *
 * Run: npm run encrypt-key -- [object-name]
 * The key is read from PRIVATE_KEY, or from stdin when that is unset.
 */

import * as dotenv from 'dotenv';
dotenv.config();

import chalk from 'chalk';
import * as readline from 'readline';
import { loadConfig } from '../utils/config';
import { errorMessage } from '../utils/errors';
import { createKeyBackend } from '../wallet/KeyBackendFactory';
import { sealKey } from '../wallet/KeySealer';

function readKeyFromStdin(): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr, terminal: false });
  process.stderr.write('Enter EVM private key: ');
  return new Promise((resolve) => {
    rl.once('line', (line) => {
      rl.close();
      resolve(line.trim());
    });
    rl.once('close', () => resolve(''));
  });
}

async function main() {
  const config = await loadConfig();
  const objectName = process.argv[2] || config.keyObjectName;
  const privateKey = process.env.PRIVATE_KEY || (await readKeyFromStdin());
  if (!privateKey) {
    console.error(chalk.red('[ERROR]'), 'No private key entered. Exiting.');
    process.exit(1);
  }

  const { store, cipher } = createKeyBackend(config);
  console.log(chalk.blue('[INFO]'), `Encrypting with ${config.kmsKeyName}…`);
  const sealed = await sealKey({
    store,
    cipher,
    bucket: config.inputBucket,
    kmsKeyName: config.kmsKeyName,
    objectName,
    privateKey,
  });

  console.log(chalk.green('[SUCCESS]'), `Uploaded ${sealed.bytes} bytes to gs://${config.inputBucket}/${sealed.objectName}`);
  console.log(chalk.green('[SUCCESS]'), `Address: ${chalk.white(sealed.address)}`);
}

main().catch((err) => {
  console.error(chalk.red('[ERROR]'), errorMessage(err));
  process.exit(1);
});
