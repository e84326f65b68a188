import { createHash } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Fingerprint a credential so logs can tell tokens apart without showing them
 * @param data - Sensitive data to hash
 * @returns A masked representation with partial hash
 */
export function hashForLogging(data: string | undefined): string {
  if (!data || data.length === 0) {
    return '[none]';
  }
  const hash = sha256(data).substring(0, 8);
  return `***${hash}`;
}
