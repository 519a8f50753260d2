import { createHash } from 'node:crypto';

export const SURROGATE_KEY_NULL = '_surrogate_key_null_';
const SURROGATE_KEY_SEPARATOR = '-';

export type SurrogateKeyValue = string | number | boolean | null;

/**
 * md5 over the values cast to text and joined with `-`, null encoded as a
 * fixed marker. Content-derived, so reruns over unchanged input reproduce the
 * same keys; collision-free at this dataset's scale, not by construction.
 */
export function generateSurrogateKey(values: readonly SurrogateKeyValue[]): string {
  const joined = values
    .map((value) => (value === null ? SURROGATE_KEY_NULL : String(value)))
    .join(SURROGATE_KEY_SEPARATOR);
  return createHash('md5').update(joined).digest('hex');
}

export function messageKey(messageId: number, channelName: string): string {
  return generateSurrogateKey([messageId, channelName]);
}

export function channelKey(channelName: string): string {
  return generateSurrogateKey([channelName]);
}

export function detectionKey(messageId: number, channelName: string, imagePath: string): string {
  return generateSurrogateKey([messageId, channelName, imagePath]);
}
