/**
 * Source rewriting pipeline
 *
 * For every selected file:
 * 1. Scan for marker calls (`obf("...")`, `obfw("...")`)
 * 2. Encrypt each literal with the build key
 * 3. Replace each call by a hoisted accessor and insert the prelude that
 *    declares the accessors from ciphertext only
 *
 * The key is derived once per run, so every file of a build shares it.
 */

import * as ts from 'typescript';
import type { ModuleFormat, SourceFile, TransformResult } from '../types';
import { ObfuscatorConfig, ObfuscateOptions, isFileSelected } from '../config';
import { ObfuscatedString } from '../obfuscated';
import { deriveKey } from '../keys';
import { findMarkedLiterals } from './literals';

export function moduleFormatFor(fileName: string, fallback: ModuleFormat): ModuleFormat {
  if (/\.c[jt]s$/.test(fileName)) return 'cjs';
  if (/\.m[jt]s$/.test(fileName)) return 'esm';
  return fallback;
}

/** `__shroud`, or a longer variant if the file already uses that name. */
function uniquePrefix(code: string): string {
  let prefix = '__shroud';
  while (code.includes(prefix)) prefix = '_' + prefix;
  return prefix;
}

/**
 * Offset where the prelude goes: after a shebang, the directive prologue and
 * the leading imports, but never after the statement holding the first marker
 * call. Imports that follow other statements stay below the prelude.
 */
function preludeOffset(sourceFile: ts.SourceFile, firstUse: number): number {
  const text = sourceFile.text;
  let offset = 0;
  if (text.startsWith('#!')) {
    const nl = text.indexOf('\n');
    offset = nl === -1 ? text.length : nl + 1;
  }

  let inPrologue = true;
  for (const stmt of sourceFile.statements) {
    if (stmt.getEnd() > firstUse) break;
    if (ts.isImportDeclaration(stmt) || ts.isImportEqualsDeclaration(stmt)) {
      offset = stmt.getEnd();
      inPrologue = false;
    } else if (inPrologue && ts.isExpressionStatement(stmt) && ts.isStringLiteral(stmt.expression)) {
      offset = stmt.getEnd();
    } else {
      break;
    }
  }
  return offset;
}

export function transformSource(
  code: string,
  fileName: string,
  config: ObfuscatorConfig,
  key: number = deriveKey(config.key.seed, config.key.rounds),
): TransformResult {
  const { sourceFile, literals, skipped } = findMarkedLiterals(code, fileName, config.markers, config.codegen.runtimeModule);
  if (literals.length === 0) {
    return { code, replaced: 0, skipped };
  }

  const prefix = uniquePrefix(code);
  const sealedName = `${prefix}Sealed`;
  const specifier = JSON.stringify(config.codegen.runtimeModule);

  const lines: string[] = [];
  if (moduleFormatFor(fileName, config.codegen.moduleFormat) === 'esm') {
    lines.push(`import { sealed as ${sealedName} } from ${specifier};`);
  } else {
    lines.push(`const { sealed: ${sealedName} } = require(${specifier});`);
  }
  literals.forEach((literal, i) => {
    const units = ObfuscatedString.encrypt(literal.text, key, literal.width).ciphertext();
    lines.push(`const ${prefix}${i} = ${sealedName}("${literal.width}", ${key}, [${units.join(', ')}]);`);
  });
  const prelude = lines.join('\n');

  // Splice from the end so earlier offsets stay valid
  let out = code;
  for (let i = literals.length - 1; i >= 0; i--) {
    const { start, end } = literals[i];
    out = out.slice(0, start) + `${prefix}${i}()` + out.slice(end);
  }

  const offset = preludeOffset(sourceFile, literals[0].start);
  const atLineStart = offset === 0 || code[offset - 1] === '\n';
  const insert = atLineStart ? `${prelude}\n` : `\n${prelude}`;
  out = out.slice(0, offset) + insert + out.slice(offset);

  return { code: out, replaced: literals.length, skipped };
}

export interface FileReport {
  path: string;
  replaced: number;
  skipped: number;
}

export interface ObfuscateSourcesResult {
  key: number;
  files: SourceFile[];
  reports: FileReport[];
}

/**
 * Rewrite a set of files. Files that are not selected, or hold no marker
 * calls, come back unchanged.
 */
export function obfuscateSources(
  files: SourceFile[],
  config: ObfuscatorConfig,
  opts?: ObfuscateOptions,
): ObfuscateSourcesResult {
  const key = deriveKey(config.key.seed, config.key.rounds);
  console.log(`[shroud] Key derived from seed ${config.key.seed} (${config.key.rounds} rounds)`);

  const out: SourceFile[] = [];
  const reports: FileReport[] = [];

  for (const file of files) {
    if (!isFileSelected(file.path, config, opts)) {
      out.push(file);
      continue;
    }

    const result = transformSource(file.code, file.path, config, key);
    for (const skip of result.skipped) {
      console.warn(`[shroud] ${file.path}:${skip.line}: ${skip.callee}() left as is: ${skip.reason}`);
    }
    if (result.replaced > 0) {
      console.log(`[shroud] ${file.path}: ${result.replaced} literal(s) encrypted`);
    }

    out.push({ path: file.path, code: result.code });
    reports.push({ path: file.path, replaced: result.replaced, skipped: result.skipped.length });
  }

  return { key, files: out, reports };
}

export { findMarkedLiterals, scriptKindFor } from './literals';
export type { ScanResult } from './literals';
