import * as fs from 'fs';
import JSZip from 'jszip';
import type { SourceFile } from './types';
import type { ObfuscatorConfig } from './config';

/** Read a .zip bundle and extract the entries the code generator may rewrite */
export async function readArchive(
  filePath: string,
  config: ObfuscatorConfig,
): Promise<{ files: SourceFile[]; zip: JSZip }> {
  const data = fs.readFileSync(filePath);
  const zip = await JSZip.loadAsync(data);

  const files: SourceFile[] = [];
  for (const entry of Object.values(zip.files)) {
    if (entry.dir) continue;
    if (!config.codegen.extensions.some(ext => entry.name.endsWith(ext))) continue;
    files.push({ path: entry.name, code: await entry.async('string') });
  }

  return { files, zip };
}

/** Write rewritten sources back into the bundle, preserving every other entry */
export async function writeArchive(filePath: string, files: SourceFile[], zip: JSZip): Promise<void> {
  for (const file of files) {
    zip.file(file.path, file.code);
  }

  const output = await zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });

  fs.writeFileSync(filePath, output);
}
