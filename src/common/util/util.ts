import { createHash } from 'crypto';

export function assert(condition: boolean, msg?: string | (() => string)): asserts condition {
  if (!condition) {
    throw new Error(msg && (typeof msg === 'string' ? msg : msg()));
  }
}

export function unreachable(msg?: string): never {
  throw new Error(msg);
}

// performance.now() is global since Node 16.
export function now(): number {
  return performance.now();
}

/**
 * Turn an arbitrary object into a SHA-1 hex digest of its string form.
 */
export function simpleObjectHash(obj: unknown): string {
  return createHash('sha1').update(String(obj)).digest('hex');
}
