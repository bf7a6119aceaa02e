import { AppConfig } from '../utils/config';
import { GcsObjectStore } from './GcsObjectStore';
import { KmsKeyCipher } from './KmsKeyCipher';
import { KeyCipher, ObjectStore } from './KeyStore';
import { LocalKeyCipher } from './LocalKeyCipher';
import { LocalObjectStore } from './LocalObjectStore';

export interface KeyBackend {
  store: ObjectStore;
  cipher: KeyCipher;
}

type BackendConfig = Pick<AppConfig, 'keyBackend' | 'localKeyDir' | 'localKeySecret' | 'projectId'>;

export function createKeyBackend(config: BackendConfig): KeyBackend {
  if (config.keyBackend === 'local') {
    return {
      store: new LocalObjectStore(config.localKeyDir),
      cipher: new LocalKeyCipher(config.localKeySecret ?? ''),
    };
  }
  return {
    store: new GcsObjectStore(config.projectId),
    cipher: new KmsKeyCipher(),
  };
}
