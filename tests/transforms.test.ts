import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_CONFIG, mergeConfig } from '../src/config';
import { findMarkedLiterals, moduleFormatFor, obfuscateSources, transformSource } from '../src/transforms';
import { scriptKindFor } from '../src/transforms/literals';
import * as ts from 'typescript';

describe('findMarkedLiterals', () => {
  it('finds marker calls with a literal argument', () => {
    const code = [
      "import * as strings from 'string-shroud/runtime';",
      "const a = obf('one');",
      'const b = strings.obfw(`two`);',
      'const c = other("three");',
    ].join('\n');
    const { literals, skipped } = findMarkedLiterals(code, 'a.ts', DEFAULT_CONFIG.markers);
    expect(literals).toEqual([
      { start: 60, end: 70, width: 'narrow', text: 'one', line: 2 },
      { start: 82, end: 101, width: 'wide', text: 'two', line: 3 },
    ]);
    expect(skipped).toEqual([]);
  });

  it('only takes member calls on the runtime module', () => {
    const code = [
      "import shroud = require('string-shroud/runtime');",
      "const rt = require('string-shroud/runtime');",
      "shroud.obf('a');",
      "rt.obfw('b');",
      "cache.obf('c');",
      "this.obf('d');",
    ].join('\n');
    const { literals, skipped } = findMarkedLiterals(code, 'a.ts', DEFAULT_CONFIG.markers);
    expect(literals.map(l => l.text)).toEqual(['a', 'b']);
    expect(skipped).toEqual([]);
  });

  it('follows the configured runtime module for member calls', () => {
    const code = "import * as rt from './runtime';\nrt.obf('a');";
    expect(findMarkedLiterals(code, 'a.ts', DEFAULT_CONFIG.markers).literals).toEqual([]);
    expect(findMarkedLiterals(code, 'a.ts', DEFAULT_CONFIG.markers, './runtime').literals.map(l => l.text)).toEqual(['a']);
  });

  it('skips marker names bound by a local declaration', () => {
    const code = [
      'function f(obf: (s: string) => string) { return obf("a"); }',
      'const g = ({ obfw }: Api) => obfw("b");',
      'function h() { const obf = (s: string) => s; return obf("c"); }',
      'try { x(); } catch (obf) { obf("d"); }',
      'for (const [obf] of pairs) obf("e");',
      'function k() { return obf("f"); }',
    ].join('\n');
    const { literals, skipped } = findMarkedLiterals(code, 'a.ts', DEFAULT_CONFIG.markers);
    expect(skipped).toEqual([
      { line: 1, callee: 'obf', reason: 'name refers to a local declaration' },
      { line: 2, callee: 'obfw', reason: 'name refers to a local declaration' },
      { line: 3, callee: 'obf', reason: 'name refers to a local declaration' },
      { line: 4, callee: 'obf', reason: 'name refers to a local declaration' },
      { line: 5, callee: 'obf', reason: 'name refers to a local declaration' },
    ]);
    expect(literals.map(l => l.text)).toEqual(['f']);
  });

  it('treats a top-level function of the same name as local', () => {
    const code = 'function obf(s: string) { return s; }\nobf("a");';
    const { literals, skipped } = findMarkedLiterals(code, 'a.ts', DEFAULT_CONFIG.markers);
    expect(literals).toEqual([]);
    expect(skipped).toEqual([{ line: 2, callee: 'obf', reason: 'name refers to a local declaration' }]);
  });

  it('accepts markers pulled in with require', () => {
    const code = [
      "const { obf } = require('string-shroud/runtime');",
      "const obfw = require('string-shroud/runtime').obfw;",
      "obf('a');",
      "obfw('b');",
    ].join('\n');
    const { literals, skipped } = findMarkedLiterals(code, 'a.js', DEFAULT_CONFIG.markers);
    expect(literals.map(l => l.text)).toEqual(['a', 'b']);
    expect(skipped).toEqual([]);
  });

  it('skips narrow text with a lone surrogate', () => {
    const code = "obf('a\\uD800b');\nobfw('a\\uD800b');\nobf('\\uD83D\\uDE00');";
    const { literals, skipped } = findMarkedLiterals(code, 'a.ts', DEFAULT_CONFIG.markers);
    expect(skipped).toEqual([{ line: 1, callee: 'obf', reason: 'narrow text cannot hold a lone surrogate' }]);
    expect(literals.map(l => [l.width, l.text])).toEqual([['wide', 'a\uD800b'], ['narrow', '\uD83D\uDE00']]);
  });

  it('reports marker calls it cannot rewrite', () => {
    const code = [
      'obf(name);',
      'obf(`a${b}`);',
      "obf('a', 'b');",
      "obf(obf('inner'));",
    ].join('\n');
    const { literals, skipped } = findMarkedLiterals(code, 'a.ts', DEFAULT_CONFIG.markers);
    expect(skipped).toEqual([
      { line: 1, callee: 'obf', reason: 'argument is not a string literal' },
      { line: 2, callee: 'obf', reason: 'template literal has substitutions' },
      { line: 3, callee: 'obf', reason: 'expected one argument, got 2' },
      { line: 4, callee: 'obf', reason: 'argument is not a string literal' },
    ]);
    expect(literals.map(l => l.text)).toEqual(['inner']);
  });

  it('uses the cooked value of escapes', () => {
    const { literals } = findMarkedLiterals("obf('tab\\there')", 'a.ts', DEFAULT_CONFIG.markers);
    expect(literals[0].text).toBe('tab\there');
  });

  it('parses JSX', () => {
    const code = 'const el = <span title={obf("tip")}>x</span>;';
    const { literals } = findMarkedLiterals(code, 'view.tsx', DEFAULT_CONFIG.markers);
    expect(literals.map(l => l.text)).toEqual(['tip']);
  });
});

describe('scriptKindFor', () => {
  it('picks the parser mode from the extension', () => {
    expect(scriptKindFor('a.tsx')).toBe(ts.ScriptKind.TSX);
    expect(scriptKindFor('a.jsx')).toBe(ts.ScriptKind.JSX);
    expect(scriptKindFor('a.mjs')).toBe(ts.ScriptKind.JS);
    expect(scriptKindFor('a.cts')).toBe(ts.ScriptKind.TS);
  });
});

describe('transformSource', () => {
  it('hoists accessors after the imports', () => {
    const code = [
      "import { obf } from 'string-shroud/runtime';",
      '',
      "console.log(obf('Hello'));",
      '',
    ].join('\n');
    const result = transformSource(code, 'app.ts', DEFAULT_CONFIG);
    expect(result.replaced).toBe(1);
    expect(result.code).toBe([
      "import { obf } from 'string-shroud/runtime';",
      'import { sealed as __shroudSealed } from "string-shroud/runtime";',
      'const __shroud0 = __shroudSealed("narrow", 184, [240, 220, 214, 215, 211, 189]);',
      '',
      'console.log(__shroud0());',
      '',
    ].join('\n'));
  });

  it('emits require after a shebang and directive prologue', () => {
    const code = "#!/usr/bin/env node\n'use strict';\nconst s = obfw(`Hi`);\n";
    const result = transformSource(code, 'tool.cjs', DEFAULT_CONFIG);
    expect(result.code).toBe([
      '#!/usr/bin/env node',
      "'use strict';",
      'const { sealed: __shroudSealed } = require("string-shroud/runtime");',
      'const __shroud0 = __shroudSealed("wide", 184, [240, 208, 186]);',
      'const s = __shroud0();',
      '',
    ].join('\n'));
  });

  it('puts the prelude first when there is nothing to skip', () => {
    const result = transformSource('const a = obf("x");', 'a.js', DEFAULT_CONFIG);
    expect(result.code).toBe([
      'import { sealed as __shroudSealed } from "string-shroud/runtime";',
      'const __shroud0 = __shroudSealed("narrow", 184, [192, 185]);',
      'const a = __shroud0();',
    ].join('\n'));
  });

  it('numbers accessors in source order', () => {
    const result = transformSource('f(obf("x"), obf("x"));', 'a.ts', DEFAULT_CONFIG);
    expect(result.replaced).toBe(2);
    expect(result.code.split('\n').pop()).toBe('f(__shroud0(), __shroud1());');
  });

  it('follows the configured seed, format and runtime module', () => {
    const config = mergeConfig(DEFAULT_CONFIG, {
      key: { seed: 7001 },
      codegen: { moduleFormat: 'cjs', runtimeModule: './runtime' },
    });
    const result = transformSource('const a = obf("x");', 'a.ts', config);
    expect(result.code).toBe([
      'const { sealed: __shroudSealed } = require("./runtime");',
      'const __shroud0 = __shroudSealed("narrow", 154, [226, 155]);',
      'const a = __shroud0();',
    ].join('\n'));
  });

  it('avoids names the file already uses', () => {
    const result = transformSource('const __shroud = 1;\nobf("x");', 'a.ts', DEFAULT_CONFIG);
    expect(result.code).toBe([
      'import { sealed as ___shroudSealed } from "string-shroud/runtime";',
      'const ___shroud0 = ___shroudSealed("narrow", 184, [192, 185]);',
      'const __shroud = 1;',
      '___shroud0();',
    ].join('\n'));
  });

  it('keeps the prelude above the first use', () => {
    const code = "const a = obf('x');\nimport b from 'b';\n";
    const result = transformSource(code, 'a.ts', DEFAULT_CONFIG);
    expect(result.code.startsWith('import { sealed as __shroudSealed }')).toBe(true);
  });

  it('keeps later imports below code that runs before them', () => {
    const code = "import a from 'a';\nmain();\nimport b from 'b';\nfunction main() { return obf('x'); }";
    const result = transformSource(code, 'app.ts', DEFAULT_CONFIG);
    expect(result.code).toBe([
      "import a from 'a';",
      'import { sealed as __shroudSealed } from "string-shroud/runtime";',
      'const __shroud0 = __shroudSealed("narrow", 184, [192, 185]);',
      'main();',
      "import b from 'b';",
      'function main() { return __shroud0(); }',
    ].join('\n'));
    expect(result.code.indexOf('const __shroud0')).toBeLessThan(result.code.indexOf('main();'));
  });

  it('emits an import in .mts files whatever the configured format', () => {
    const config = mergeConfig(DEFAULT_CONFIG, { codegen: { moduleFormat: 'cjs' } });
    const result = transformSource("export const s = obf('x');", 'mod.mts', config);
    expect(result.code).toBe([
      'import { sealed as __shroudSealed } from "string-shroud/runtime";',
      'const __shroud0 = __shroudSealed("narrow", 184, [192, 185]);',
      'export const s = __shroud0();',
    ].join('\n'));
  });

  it('leaves a shadowing parameter alone', () => {
    const code = 'function f(obf: (s: string) => string) { return obf("x"); }';
    expect(transformSource(code, 'a.ts', DEFAULT_CONFIG)).toEqual({
      code,
      replaced: 0,
      skipped: [{ line: 1, callee: 'obf', reason: 'name refers to a local declaration' }],
    });
  });

  it('leaves files without markers untouched', () => {
    const code = "import x from 'y';\nconsole.log('Hello');\n";
    expect(transformSource(code, 'a.ts', DEFAULT_CONFIG)).toEqual({ code, replaced: 0, skipped: [] });
  });

  it('is reproducible', () => {
    const code = "export const token = obf('test-secret');\n";
    expect(transformSource(code, 'a.ts', DEFAULT_CONFIG).code).toBe(transformSource(code, 'a.ts', DEFAULT_CONFIG).code);
    expect(transformSource(code, 'a.ts', DEFAULT_CONFIG).code).not.toContain('test-secret');
  });
});

describe('moduleFormatFor', () => {
  it('lets .mjs, .mts, .cjs and .cts decide', () => {
    expect(moduleFormatFor('a.cjs', 'esm')).toBe('cjs');
    expect(moduleFormatFor('a.cts', 'esm')).toBe('cjs');
    expect(moduleFormatFor('a.mjs', 'cjs')).toBe('esm');
    expect(moduleFormatFor('a.mts', 'cjs')).toBe('esm');
    expect(moduleFormatFor('a.ts', 'cjs')).toBe('cjs');
  });
});

describe('obfuscateSources', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rewrites selected files with one key and reports what it did', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const files = [
      { path: 'src/a.ts', code: 'obf("x");' },
      { path: 'src/b.ts', code: 'obf(name);' },
      { path: 'src/types.d.ts', code: 'declare const s: string;' },
      { path: 'README.md', code: 'obf("x")' },
    ];
    const result = obfuscateSources(files, DEFAULT_CONFIG);

    expect(result.key).toBe(184);
    expect(result.files.map(f => f.path)).toEqual(['src/a.ts', 'src/b.ts', 'src/types.d.ts', 'README.md']);
    expect(result.files[0].code).toBe([
      'import { sealed as __shroudSealed } from "string-shroud/runtime";',
      'const __shroud0 = __shroudSealed("narrow", 184, [192, 185]);',
      '__shroud0();',
    ].join('\n'));
    expect(result.files[1].code).toBe('obf(name);');
    expect(result.files[3].code).toBe('obf("x")');
    expect(result.reports).toEqual([
      { path: 'src/a.ts', replaced: 1, skipped: 0 },
      { path: 'src/b.ts', replaced: 0, skipped: 1 },
    ]);

    expect(log).toHaveBeenCalledWith('[shroud] Key derived from seed 3421 (10 rounds)');
    expect(log).toHaveBeenCalledWith('[shroud] src/a.ts: 1 literal(s) encrypted');
    expect(warn).toHaveBeenCalledWith('[shroud] src/b.ts:1: obf() left as is: argument is not a string literal');
  });

  it('honours the file options', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const files = [
      { path: 'src/a.ts', code: 'obf("x");' },
      { path: 'vendor/b.ts', code: 'obf("x");' },
    ];
    const result = obfuscateSources(files, DEFAULT_CONFIG, { excludeFiles: ['vendor'] });
    expect(result.files[1].code).toBe('obf("x");');
    expect(result.reports.map(r => r.path)).toEqual(['src/a.ts']);
  });
});
