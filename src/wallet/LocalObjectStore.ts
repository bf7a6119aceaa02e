import * as fs from 'fs';
import * as path from 'path';
import { InvalidInputError, NotFoundError } from '../utils/errors';
import { ObjectStore } from './KeyStore';

/** Directory-backed bucket layout: `<root>/<bucket>/<object name>`. */
export class LocalObjectStore implements ObjectStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async download(bucket: string, name: string): Promise<Buffer> {
    const file = this.objectPath(bucket, name);
    if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
      throw new NotFoundError(`Object not found: ${bucket}/${name}`);
    }
    return fs.readFileSync(file);
  }

  async list(bucket: string, prefix = ''): Promise<string[]> {
    const dir = this.bucketPath(bucket);
    if (!fs.existsSync(dir)) return [];
    return fs
      .readdirSync(dir, { recursive: true, encoding: 'utf-8' })
      .map((f) => f.split(path.sep).join('/'))
      .filter((f) => f.startsWith(prefix) && fs.statSync(path.join(dir, f)).isFile())
      .sort();
  }

  async upload(bucket: string, name: string, data: Buffer): Promise<void> {
    const file = this.objectPath(bucket, name);
    fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o700 });
    fs.writeFileSync(file, data, { mode: 0o600 });
  }

  private bucketPath(bucket: string): string {
    return this.contained(this.root, bucket);
  }

  private objectPath(bucket: string, name: string): string {
    return this.contained(this.bucketPath(bucket), name);
  }

  private contained(base: string, child: string): string {
    const resolved = path.resolve(base, child);
    if (!child || resolved === base || !resolved.startsWith(base + path.sep)) {
      throw new InvalidInputError(`Invalid object path: ${child}`);
    }
    return resolved;
  }
}
