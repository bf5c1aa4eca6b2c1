import type { CharWidth, UnitBuffer } from './types';

const UNIT_MASK: Record<CharWidth, number> = {
  narrow: 0xFF,
  wide: 0xFFFF,
};

export function unitMask(width: CharWidth): number {
  return UNIT_MASK[width];
}

/** Keystream value for one position, truncated to the unit width. */
export function maskFor(key: number, index: number, width: CharWidth): number {
  return (key + index) & UNIT_MASK[width];
}

/** XOR masking of a single unit. Its own inverse. */
export function transformUnit(unit: number, index: number, key: number, width: CharWidth): number {
  return (unit ^ maskFor(key, index, width)) & UNIT_MASK[width];
}

export function allocateUnits(length: number, width: CharWidth): UnitBuffer {
  return width === 'narrow' ? new Uint8Array(length) : new Uint16Array(length);
}

/** Narrow text is UTF-8, wide text is UTF-16 code units. */
export function encodeText(text: string, width: CharWidth): UnitBuffer {
  if (width === 'narrow') {
    return new TextEncoder().encode(text);
  }
  const units = new Uint16Array(text.length);
  for (let i = 0; i < text.length; i++) {
    units[i] = text.charCodeAt(i);
  }
  return units;
}

// String.fromCharCode takes its arguments on the stack
const DECODE_CHUNK = 0x2000;

export function decodeUnits(units: UnitBuffer, width: CharWidth): string {
  if (width === 'narrow') {
    return new TextDecoder().decode(units);
  }
  let text = '';
  for (let i = 0; i < units.length; i += DECODE_CHUNK) {
    text += String.fromCharCode(...units.subarray(i, i + DECODE_CHUNK));
  }
  return text;
}
