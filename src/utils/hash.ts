import { createHash } from 'crypto';

/**
 * SHA-256 digest of the UTF-8 encoding of a string, as lower-case hex
 */
export function sha256Hex(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}
