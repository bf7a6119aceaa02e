import { Storage } from '@google-cloud/storage';
import { NotFoundError, PermissionDeniedError, UpstreamError, errorMessage } from '../utils/errors';
import { ObjectStore, errorCode } from './KeyStore';

export class GcsObjectStore implements ObjectStore {
  private storage: Storage;

  constructor(projectId?: string) {
    this.storage = new Storage(projectId ? { projectId } : {});
  }

  async download(bucket: string, name: string): Promise<Buffer> {
    try {
      const [contents] = await this.storage.bucket(bucket).file(name).download();
      return contents;
    } catch (err) {
      throw this.translate(err, `gs://${bucket}/${name}`);
    }
  }

  async list(bucket: string, prefix = ''): Promise<string[]> {
    try {
      const [files] = await this.storage.bucket(bucket).getFiles(prefix ? { prefix } : {});
      return files.map((f) => f.name).filter((name) => !name.endsWith('/'));
    } catch (err) {
      throw this.translate(err, `gs://${bucket}/${prefix}`);
    }
  }

  async upload(bucket: string, name: string, data: Buffer): Promise<void> {
    try {
      await this.storage.bucket(bucket).file(name).save(data, { resumable: false });
    } catch (err) {
      throw this.translate(err, `gs://${bucket}/${name}`);
    }
  }

  private translate(err: unknown, path: string): Error {
    switch (errorCode(err)) {
      case 404:
        return new NotFoundError(`Object not found: ${path}`, { cause: err });
      case 401:
      case 403:
        return new PermissionDeniedError(`Access denied to ${path}`, { cause: err });
      default:
        return new UpstreamError(`Cloud Storage request for ${path} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
