/**
 * string-shroud - Library Entry Point
 *
 * Can be used as:
 * 1. A build step: string-shroud src -o build/src --seed 7001
 * 2. A Node.js library: import { obfuscatePath, transformSource } from 'string-shroud'
 * 3. At run time: import { obf, sealed } from 'string-shroud/runtime'
 */

export type { CharWidth, UnitBuffer, ModuleFormat, MarkedLiteral, SkippedCall, SourceFile, TransformResult } from './types';
export { isCharWidth } from './types';
export {
  DEFAULT_CONFIG,
  mergeConfig, parseConfigOverrides, isFileSelected,
} from './config';
export type { ObfuscatorConfig, ObfuscateOptions, ConfigOverrides } from './config';
export { DEFAULT_SEED, DEFAULT_ROUNDS, linearCongruentGenerator, randomNumber, deriveKey } from './keys';
export { maskFor, transformUnit, encodeText, decodeUnits } from './transform';
export {
  ObfuscatedString, PlaintextString, AlreadyDecryptedError,
  obfuscate, withPlaintext,
} from './obfuscated';
export type { ObfuscateStringOptions } from './obfuscated';
export { DeferScope, withDefer } from './defer';
export { sealed, obf, obfw } from './runtime';
export { transformSource, obfuscateSources, findMarkedLiterals } from './transforms';
export type { FileReport, ObfuscateSourcesResult } from './transforms';
export { readArchive, writeArchive } from './archive';
export { readSourceTree, writeSourceTree } from './files';

import * as fs from 'fs';
import * as path from 'path';
import { readArchive, writeArchive } from './archive';
import { readSourceTree, writeSourceTree } from './files';
import { obfuscateSources, ObfuscateSourcesResult } from './transforms';
import { DEFAULT_CONFIG, ObfuscatorConfig, ObfuscateOptions } from './config';

/** `src` → `src.shrouded`, `app.ts` → `app.shrouded.ts`, `bundle.zip` → `bundle.shrouded.zip` */
export function defaultOutputPath(inputPath: string): string {
  const dir = path.dirname(inputPath);
  if (fs.existsSync(inputPath) && fs.statSync(inputPath).isDirectory()) {
    return path.join(dir, `${path.basename(inputPath)}.shrouded`);
  }
  const ext = path.extname(inputPath);
  const base = path.basename(inputPath, ext);
  return path.join(dir, `${base}.shrouded${ext}`);
}

/**
 * Rewrite a file, a directory tree or a .zip bundle.
 * Directories are copied whole; only selected source files change.
 */
export async function obfuscatePath(
  inputPath: string,
  outputPath: string,
  config: ObfuscatorConfig = DEFAULT_CONFIG,
  opts?: ObfuscateOptions,
): Promise<ObfuscateSourcesResult> {
  const stat = fs.statSync(inputPath);

  if (stat.isDirectory()) {
    const result = obfuscateSources(readSourceTree(inputPath, config), config, opts);
    if (path.resolve(outputPath) !== path.resolve(inputPath)) {
      fs.cpSync(inputPath, outputPath, {
        recursive: true,
        filter: src => !['node_modules', '.git'].includes(path.basename(src)),
      });
    }
    writeSourceTree(outputPath, result.files);
    return result;
  }

  if (path.extname(inputPath).toLowerCase() === '.zip') {
    const { files, zip } = await readArchive(inputPath, config);
    const result = obfuscateSources(files, config, opts);
    await writeArchive(outputPath, result.files, zip);
    return result;
  }

  const code = fs.readFileSync(inputPath, 'utf-8');
  const result = obfuscateSources([{ path: path.basename(inputPath), code }], config, opts);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, result.files[0].code);
  return result;
}
