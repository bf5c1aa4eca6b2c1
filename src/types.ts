// ── Text widths ─────────────────────────────────────────────────────

/**
 * `narrow`: one byte per unit (UTF-8).
 * `wide`: one 16-bit unit per UTF-16 code unit.
 */
export type CharWidth = 'narrow' | 'wide';

export type UnitBuffer = Uint8Array | Uint16Array;

export function isCharWidth(value: unknown): value is CharWidth {
  return value === 'narrow' || value === 'wide';
}

// ── Code generation ────────────────────────────────────────────────

export type ModuleFormat = 'esm' | 'cjs';

/** A marker call found in a source file, e.g. `obf("token")`. */
export interface MarkedLiteral {
  /** Offset of the first character of the call expression */
  start: number;
  /** Offset just past the closing parenthesis */
  end: number;
  width: CharWidth;
  text: string;
  line: number;
}

/** A marker call that could not be rewritten */
export interface SkippedCall {
  line: number;
  callee: string;
  reason: string;
}

export interface SourceFile {
  /** Path relative to the input root, using forward slashes */
  path: string;
  code: string;
}

export interface TransformResult {
  code: string;
  /** Number of literals replaced */
  replaced: number;
  skipped: SkippedCall[];
}
