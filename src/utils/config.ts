import { ConfigError } from './errors';
import { MetadataReader, readInstanceMetadata } from './metadata';

export type KeyBackend = 'gcp' | 'local';

export interface AppConfig {
  port: number;
  inputBucket: string;
  keyObjectName: string;
  keyObjectPrefix: string;
  kmsKeyName: string;
  keyBackend: KeyBackend;
  localKeyDir: string;
  localKeySecret?: string;
  loadKeyOnStart: boolean;
  projectId?: string;
  region: string;
  geminiModel: string;
  systemPrompt?: string;
  chatHistoryLimit: number;
  evmNetwork: string;
  evmRpcUrl?: string;
  rpcTimeoutMs: number;
  metricsEnabled: boolean;
  metricsPort: number;
}

export interface ConfigSource {
  env?: NodeJS.ProcessEnv;
  /** Consulted for every variable the environment leaves unset. */
  metadata?: MetadataReader;
}

const num = (name: string, v: string | undefined, def: number): number => {
  const n = v !== undefined ? Number(v) : def;
  if (!Number.isInteger(n)) throw new ConfigError(`${name} must be an integer, got "${v}"`);
  return n;
};

const bool = (v: string | undefined, def: boolean): boolean =>
  v === undefined ? def : !['false', '0', 'no', 'off'].includes(v.toLowerCase());

const VARIABLES = [
  'PORT',
  'INPUT_BUCKET_NAME',
  'KEY_OBJECT_NAME',
  'KEY_OBJECT_PREFIX',
  'KMS_KEY_NAME',
  'KEY_BACKEND',
  'LOCAL_KEY_DIR',
  'LOCAL_KEY_SECRET',
  'LOAD_KEY_ON_START',
  'PROJECT_ID',
  'REGION',
  'GEMINI_MODEL',
  'SYSTEM_PROMPT',
  'CHAT_HISTORY_LIMIT',
  'EVM_NETWORK',
  'EVM_RPC_URL',
  'RPC_TIMEOUT_MS',
  'METRICS_ENABLE',
  'METRICS_PORT',
] as const;

type Variable = (typeof VARIABLES)[number];

/**
 * Builds the process configuration from the environment, falling back to
 * instance metadata. Metadata lookups for all unset variables run at once,
 * so startup waits for at most one metadata timeout. Throws ConfigError on a
 * missing required value or a malformed number; the entry point treats that
 * as fatal.
 */
export async function loadConfig(source: ConfigSource = {}): Promise<AppConfig> {
  const env = source.env ?? process.env;
  const metadata = source.metadata ?? readInstanceMetadata;

  const resolved = new Map<Variable, string | undefined>(
    await Promise.all(
      VARIABLES.map(async (name): Promise<[Variable, string | undefined]> => {
        const fromEnv = env[name];
        if (fromEnv !== undefined && fromEnv !== '') return [name, fromEnv];
        return [name, await metadata(name)];
      })
    )
  );

  const get = (name: Variable): string | undefined => resolved.get(name);
  const required = (name: Variable): string => {
    const value = get(name);
    if (!value) throw new ConfigError(`Required variable ${name} is not set in environment or metadata`);
    return value;
  };

  const keyBackend = get('KEY_BACKEND') ?? 'gcp';
  if (keyBackend !== 'gcp' && keyBackend !== 'local') {
    throw new ConfigError(`KEY_BACKEND must be "gcp" or "local", got "${keyBackend}"`);
  }

  const config: AppConfig = {
    port: num('PORT', get('PORT'), 8080),
    inputBucket: required('INPUT_BUCKET_NAME'),
    keyObjectName: get('KEY_OBJECT_NAME') ?? 'encrypted-key.enc',
    keyObjectPrefix: get('KEY_OBJECT_PREFIX') ?? '',
    kmsKeyName: required('KMS_KEY_NAME'),
    keyBackend,
    localKeyDir: get('LOCAL_KEY_DIR') ?? '.enclave-keys',
    localKeySecret: get('LOCAL_KEY_SECRET'),
    loadKeyOnStart: bool(get('LOAD_KEY_ON_START'), false),
    projectId: get('PROJECT_ID'),
    region: get('REGION') ?? 'us-central1',
    geminiModel: get('GEMINI_MODEL') ?? 'gemini-2.0-flash-001',
    systemPrompt: get('SYSTEM_PROMPT'),
    chatHistoryLimit: num('CHAT_HISTORY_LIMIT', get('CHAT_HISTORY_LIMIT'), 20),
    evmNetwork: get('EVM_NETWORK') ?? 'flare-coston',
    evmRpcUrl: get('EVM_RPC_URL'),
    rpcTimeoutMs: num('RPC_TIMEOUT_MS', get('RPC_TIMEOUT_MS'), 15000),
    metricsEnabled: bool(get('METRICS_ENABLE'), true),
    metricsPort: num('METRICS_PORT', get('METRICS_PORT'), 9464),
  };
  validateConfig(config);
  return config;
}

export function validateConfig(config: AppConfig): void {
  if (config.port <= 0 || config.port > 65535) throw new ConfigError('PORT must be between 1 and 65535');
  if (config.metricsPort <= 0 || config.metricsPort > 65535) {
    throw new ConfigError('METRICS_PORT must be between 1 and 65535');
  }
  if (config.chatHistoryLimit < 2 || config.chatHistoryLimit % 2 !== 0) {
    throw new ConfigError('CHAT_HISTORY_LIMIT must be an even number ≥ 2');
  }
  if (config.rpcTimeoutMs <= 0) throw new ConfigError('RPC_TIMEOUT_MS must be > 0');
  if (config.keyBackend === 'local' && !config.localKeySecret) {
    throw new ConfigError('LOCAL_KEY_SECRET is required when KEY_BACKEND=local');
  }
}
