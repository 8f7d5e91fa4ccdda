import { config } from '../config/index.js';

import { md5Hex } from '../crypto.js';

import { getUrlHost } from './url-validator.js';

const HASH_LENGTH = 8;
const UNSAFE_CHARS_REGEX = /[<>:"/\\|?*]|\p{C}/gu;

/**
 * `{index}-{host}-{hash}.txt`. The index keeps names at different positions
 * apart even if two URL hashes collide; the same URL at the same position
 * always maps to the same name.
 */
export function generateOutputName(
  index: number,
  url: string,
  extension: string = config.output.extension
): string {
  const host = sanitizeHost(getUrlHost(url));
  const hash = md5Hex(url).substring(0, HASH_LENGTH);
  return `${index}-${host}-${hash}${extension}`;
}

function sanitizeHost(host: string): string {
  return host.replace(UNSAFE_CHARS_REGEX, '_');
}
