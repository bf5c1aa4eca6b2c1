import type { ModuleFormat } from './types';
import { DEFAULT_ROUNDS, DEFAULT_SEED } from './keys';

export interface ObfuscatorConfig {
  /** Key derivation */
  key: {
    /** Seed of the generator. Changing it changes every emitted ciphertext. */
    seed: number;
    /** Recursion depth of the generator */
    rounds: number;
  };

  /** Call names whose string literal argument gets encrypted */
  markers: {
    /** Encrypted as UTF-8 bytes */
    narrow: string[];
    /** Encrypted as UTF-16 code units */
    wide: string[];
  };

  /** Emitted source */
  codegen: {
    /** Module specifier the prelude imports `sealed` from */
    runtimeModule: string;
    /** `import` or `require` in the prelude. .mjs/.mts and .cjs/.cts files override this. */
    moduleFormat: ModuleFormat;
    /** File extensions rewritten when walking a directory or archive */
    extensions: string[];
  };
}

export const DEFAULT_CONFIG: ObfuscatorConfig = {
  key: {
    seed: DEFAULT_SEED,
    rounds: DEFAULT_ROUNDS,
  },
  markers: {
    narrow: ['obf'],
    wide: ['obfw'],
  },
  codegen: {
    runtimeModule: 'string-shroud/runtime',
    moduleFormat: 'esm',
    extensions: ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'],
  },
};

// ── Runtime options ───────────────────────────────────────────────────

export interface ObfuscateOptions {
  /** Only rewrite these files (paths relative to the input root, or directory prefixes). */
  onlyFiles?: string[];
  /** Skip these files. Ignored if onlyFiles is also set. */
  excludeFiles?: string[];
}

function matchesPath(filePath: string, patterns: string[]): boolean {
  return patterns.some(p => {
    const pattern = p.replace(/\\/g, '/').replace(/\/+$/, '');
    return filePath === pattern || filePath.startsWith(pattern + '/');
  });
}

/** Returns true if a file should be rewritten according to the config and options. */
export function isFileSelected(filePath: string, config: ObfuscatorConfig, opts?: ObfuscateOptions): boolean {
  if (filePath.endsWith('.d.ts') || filePath.endsWith('.d.mts') || filePath.endsWith('.d.cts')) return false;
  if (!config.codegen.extensions.some(ext => filePath.endsWith(ext))) return false;
  if (opts?.onlyFiles?.length) return matchesPath(filePath, opts.onlyFiles);
  if (opts?.excludeFiles?.length) return !matchesPath(filePath, opts.excludeFiles);
  return true;
}

export type ConfigOverrides = {
  [S in keyof ObfuscatorConfig]?: Partial<ObfuscatorConfig[S]>;
};

export function mergeConfig(base: ObfuscatorConfig, overrides: ConfigOverrides): ObfuscatorConfig {
  return {
    key: { ...base.key, ...overrides.key },
    markers: {
      narrow: [...(overrides.markers?.narrow ?? base.markers.narrow)],
      wide: [...(overrides.markers?.wide ?? base.markers.wide)],
    },
    codegen: {
      ...base.codegen,
      ...overrides.codegen,
      extensions: [...(overrides.codegen?.extensions ?? base.codegen.extensions)],
    },
  };
}

// ── Config file validation ────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  const value = root[name];
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new Error(`"${name}" must be an object`);
  return value;
}

function nonNegativeInteger(value: unknown, name: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new Error(`"${name}" must be a non-negative integer`);
  }
  return value;
}

function stringList(value: unknown, name: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new Error(`"${name}" must be an array of strings`);
  }
  return value;
}

function identifierList(value: unknown, name: string): string[] | undefined {
  const list = stringList(value, name);
  for (const id of list ?? []) {
    if (!/^[A-Za-z_$][\w$]*$/.test(id)) throw new Error(`"${name}" contains an invalid identifier: ${id}`);
  }
  return list;
}

/** Validate a parsed JSON config file. Unknown keys are rejected. */
export function parseConfigOverrides(value: unknown): ConfigOverrides {
  if (!isRecord(value)) throw new Error('config must be a JSON object');
  for (const k of Object.keys(value)) {
    if (!(k in DEFAULT_CONFIG)) throw new Error(`unknown config section "${k}"`);
  }

  const overrides: ConfigOverrides = {};

  const key = section(value, 'key');
  if (key) {
    const result: Partial<ObfuscatorConfig['key']> = {};
    const seed = nonNegativeInteger(key.seed, 'key.seed');
    const rounds = nonNegativeInteger(key.rounds, 'key.rounds');
    if (seed !== undefined) result.seed = seed;
    if (rounds !== undefined) result.rounds = rounds;
    overrides.key = result;
  }

  const markers = section(value, 'markers');
  if (markers) {
    const result: Partial<ObfuscatorConfig['markers']> = {};
    const narrow = identifierList(markers.narrow, 'markers.narrow');
    const wide = identifierList(markers.wide, 'markers.wide');
    if (narrow) result.narrow = narrow;
    if (wide) result.wide = wide;
    overrides.markers = result;
  }

  const codegen = section(value, 'codegen');
  if (codegen) {
    const result: Partial<ObfuscatorConfig['codegen']> = {};
    const { runtimeModule, moduleFormat } = codegen;
    if (runtimeModule !== undefined) {
      if (typeof runtimeModule !== 'string' || runtimeModule === '') {
        throw new Error('"codegen.runtimeModule" must be a non-empty string');
      }
      result.runtimeModule = runtimeModule;
    }
    if (moduleFormat !== undefined) {
      if (moduleFormat !== 'esm' && moduleFormat !== 'cjs') {
        throw new Error('"codegen.moduleFormat" must be "esm" or "cjs"');
      }
      result.moduleFormat = moduleFormat;
    }
    const extensions = stringList(codegen.extensions, 'codegen.extensions');
    if (extensions) result.extensions = extensions;
    overrides.codegen = result;
  }

  return overrides;
}
