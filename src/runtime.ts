/**
 * Run-time entry point. Generated code imports `sealed` from here; hand-written
 * code marks literals with `obf` / `obfw` and lets the build step rewrite them.
 */

import type { CharWidth } from './types';
import { ObfuscatedString } from './obfuscated';
import { deriveKey } from './keys';

/**
 * Accessor over baked ciphertext. Decrypts on the first call and returns the
 * cached plaintext on every call after that.
 */
export function sealed(width: CharWidth, key: number, units: readonly number[]): () => string {
  const instance = ObfuscatedString.fromCiphertext(width, key, units);
  let plaintext: string | undefined;
  return () => {
    if (plaintext === undefined) {
      plaintext = instance.decrypt().toString();
    }
    return plaintext;
  };
}

let defaultKey: number | undefined;

function roundTrip(text: string, width: CharWidth): string {
  if (defaultKey === undefined) defaultKey = deriveKey();
  return ObfuscatedString.encrypt(text, defaultKey, width).decrypt().toString();
}

/** Narrow marker. Rewritten at build time; a pass-through when the build step did not run. */
export function obf(text: string): string {
  return roundTrip(text, 'narrow');
}

/** Wide marker. */
export function obfw(text: string): string {
  return roundTrip(text, 'wide');
}
