import { logger } from './logger';

const METADATA_URL = 'http://metadata.google.internal/computeMetadata/v1/instance/attributes';
const METADATA_TIMEOUT_MS = 5000;

export type MetadataReader = (key: string) => Promise<string | undefined>;

/**
 * Reads one custom attribute from the GCE metadata server. Confidential Space
 * passes launch parameters this way. Any failure (not on GCE, 404, timeout)
 * reads as an absent value.
 */
export const readInstanceMetadata: MetadataReader = async (key) => {
  try {
    const res = await fetch(`${METADATA_URL}/${encodeURIComponent(key)}`, {
      headers: { 'Metadata-Flavor': 'Google' },
      signal: AbortSignal.timeout(METADATA_TIMEOUT_MS),
    });
    if (!res.ok) {
      logger.debug(`Metadata ${key}: HTTP ${res.status}`);
      return undefined;
    }
    const value = (await res.text()).trim();
    return value || undefined;
  } catch (err) {
    logger.debug(`Metadata ${key} unavailable: ${err}`);
    return undefined;
  }
};
