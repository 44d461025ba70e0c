import { createHash } from 'crypto';

/**
 * SHA-256 over the given parts, NUL-separated so ("ab", "c") and ("a", "bc") differ.
 */
export function createContentHash(...parts: string[]): string {
  const hash = createHash('sha256');
  parts.forEach((part, i) => {
    if (i > 0) {
      hash.update('\0');
    }
    hash.update(part);
  });
  return hash.digest('hex');
}
