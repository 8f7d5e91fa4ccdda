import { createHash } from 'node:crypto';

type AllowedHashAlgorithm = 'md5' | 'sha256';

function hashHex(algorithm: AllowedHashAlgorithm, input: string): string {
  return createHash(algorithm).update(input, 'utf8').digest('hex');
}

/** Used for naming output files only. */
export function md5Hex(input: string): string {
  return hashHex('md5', input);
}
