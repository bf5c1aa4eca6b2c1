import * as fs from 'fs';
import * as path from 'path';
import type { SourceFile } from './types';
import type { ObfuscatorConfig } from './config';

const SKIP_DIRS = new Set(['node_modules', '.git']);

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/** Collect source files under `root`, with paths relative to it. */
export function readSourceTree(root: string, config: ObfuscatorConfig): SourceFile[] {
  const files: SourceFile[] = [];

  const walk = (dir: string): void => {
    const entries = fs.readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIP_DIRS.has(entry.name)) walk(full);
      } else if (entry.isFile() && config.codegen.extensions.some(ext => entry.name.endsWith(ext))) {
        files.push({ path: toPosix(path.relative(root, full)), code: fs.readFileSync(full, 'utf-8') });
      }
    }
  };

  walk(root);
  return files;
}

/** Write files under `root`, creating directories as needed. */
export function writeSourceTree(root: string, files: SourceFile[]): void {
  for (const file of files) {
    const target = path.join(root, ...file.path.split('/'));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, file.code);
  }
}
