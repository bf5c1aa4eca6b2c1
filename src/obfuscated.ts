/**
 * Obfuscated strings
 *
 * An ObfuscatedString holds `length + 1` units: the masked text followed by
 * a terminator slot. Encryption happens at build time; decryption rewrites
 * the same buffer in place at run time, exactly once.
 */

import { CharWidth, UnitBuffer, isCharWidth } from './types';
import { allocateUnits, decodeUnits, encodeText, transformUnit, unitMask } from './transform';
import { DEFAULT_ROUNDS, DEFAULT_SEED, deriveKey } from './keys';
import { withDefer } from './defer';

export class AlreadyDecryptedError extends Error {
  constructor() {
    super('ObfuscatedString has already been decrypted');
    this.name = 'AlreadyDecryptedError';
  }
}

// generated code and plain-JavaScript callers bypass the type
function checkWidth(width: CharWidth): void {
  if (!isCharWidth(width)) throw new RangeError(`unknown text width: ${String(width)}`);
}

function checkKey(key: number): void {
  if (!Number.isInteger(key) || key < 0 || key > 0xFF) {
    throw new RangeError(`key must be a byte (0-255), got ${key}`);
  }
}

/** Decrypted text, sharing storage with the instance it came from. */
export class PlaintextString {
  readonly width: CharWidth;
  private readonly buffer: UnitBuffer;

  /** @internal */
  constructor(width: CharWidth, buffer: UnitBuffer) {
    this.width = width;
    this.buffer = buffer;
  }

  /** Units before the terminator */
  get length(): number {
    return this.buffer.length - 1;
  }

  /** Text units without the terminator. A view, not a copy. */
  get units(): UnitBuffer {
    return this.buffer.subarray(0, this.length);
  }

  /** Whole buffer, terminator included */
  get terminated(): UnitBuffer {
    return this.buffer;
  }

  toString(): string {
    return decodeUnits(this.units, this.width);
  }

  /** Zero the buffer. Strings already returned by toString() are not affected. */
  wipe(): void {
    this.buffer.fill(0);
  }
}

export class ObfuscatedString {
  readonly width: CharWidth;
  readonly key: number;
  private readonly buffer: UnitBuffer;
  private decrypted = false;

  private constructor(width: CharWidth, key: number, buffer: UnitBuffer) {
    this.width = width;
    this.key = key;
    this.buffer = buffer;
  }

  /** Build-time construction from plaintext. */
  static encrypt(plaintext: string, key: number, width: CharWidth = 'narrow'): ObfuscatedString {
    checkWidth(width);
    checkKey(key);
    const units = encodeText(plaintext, width);
    const buffer = allocateUnits(units.length + 1, width);
    for (let i = 0; i < units.length; i++) {
      buffer[i] = transformUnit(units[i], i, key, width);
    }
    // terminator slot: a masked zero, overwritten by decrypt()
    buffer[units.length] = transformUnit(0, units.length, key, width);
    return new ObfuscatedString(width, key, buffer);
  }

  /** Load ciphertext emitted at build time. `units` includes the terminator slot. */
  static fromCiphertext(width: CharWidth, key: number, units: ArrayLike<number>): ObfuscatedString {
    checkWidth(width);
    checkKey(key);
    if (units.length === 0) {
      throw new RangeError('ciphertext must include the terminator slot');
    }
    const max = unitMask(width);
    const buffer = allocateUnits(units.length, width);
    for (let i = 0; i < units.length; i++) {
      const unit = units[i];
      if (!Number.isInteger(unit) || unit < 0 || unit > max) {
        throw new RangeError(`ciphertext unit ${i} out of range for ${width} text: ${unit}`);
      }
      buffer[i] = unit;
    }
    return new ObfuscatedString(width, key, buffer);
  }

  get length(): number {
    return this.buffer.length - 1;
  }

  get isDecrypted(): boolean {
    return this.decrypted;
  }

  /** Copy of the stored ciphertext, terminator slot included. */
  ciphertext(): number[] {
    if (this.decrypted) throw new AlreadyDecryptedError();
    return Array.from(this.buffer);
  }

  /**
   * Decrypt in place and hand back the plaintext view. Consumes the
   * instance: a second call throws AlreadyDecryptedError.
   */
  decrypt(): PlaintextString {
    if (this.decrypted) throw new AlreadyDecryptedError();
    this.decrypted = true;

    const n = this.length;
    for (let i = 0; i < n; i++) {
      this.buffer[i] = transformUnit(this.buffer[i], i, this.key, this.width);
    }
    this.buffer[n] = 0;
    return new PlaintextString(this.width, this.buffer);
  }
}

export interface ObfuscateStringOptions {
  seed?: number | bigint;
  rounds?: number;
  width?: CharWidth;
}

/** Encrypt with the key derived from `seed` and `rounds`. */
export function obfuscate(plaintext: string, options: ObfuscateStringOptions = {}): ObfuscatedString {
  const key = deriveKey(options.seed ?? DEFAULT_SEED, options.rounds ?? DEFAULT_ROUNDS);
  return ObfuscatedString.encrypt(plaintext, key, options.width ?? 'narrow');
}

/** Decrypt, run `body`, then zero the plaintext buffer however `body` exits. */
export function withPlaintext<T>(instance: ObfuscatedString, body: (text: string) => T): T {
  return withDefer(scope => {
    const plaintext = instance.decrypt();
    scope.defer(() => plaintext.wipe());
    return body(plaintext.toString());
  });
}
