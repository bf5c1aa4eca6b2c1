// Deterministic key derivation. Everything here runs at build time and has to
// give the same answer on every machine, so there is no Math.random() in sight.

export const DEFAULT_SEED = 3421;
export const DEFAULT_ROUNDS = 10;

const LCG_INCREMENT = 1013904223n;
const LCG_MULTIPLIER = 1664525n;
const LCG_MODULUS = 0xFFFFFFFFn;
const MAX_SEED = (1n << 64n) - 1n;

function toUint64(name: string, value: number | bigint): bigint {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new RangeError(`${name} must be a safe integer, got ${value}`);
  }
  const big = BigInt(value);
  if (big < 0n || big > MAX_SEED) {
    throw new RangeError(`${name} must fit in an unsigned 64-bit integer, got ${value}`);
  }
  return big;
}

/**
 * Pseudo random number from a linear congruential recurrence.
 *
 * `g(r) = 1013904223 + (1664525 * (r > 0 ? g(r - 1) : seed)) % 0xFFFFFFFF`,
 * evaluated in unsigned 64-bit arithmetic. Depth 0 already applies one step.
 */
export function linearCongruentGenerator(rounds: number, seed: number | bigint = DEFAULT_SEED): bigint {
  if (!Number.isSafeInteger(rounds) || rounds < 0) {
    throw new RangeError(`rounds must be a non-negative integer, got ${rounds}`);
  }
  let state = toUint64('seed', seed);
  for (let i = 0; i <= rounds; i++) {
    state = BigInt.asUintN(64, LCG_INCREMENT + BigInt.asUintN(64, LCG_MULTIPLIER * state) % LCG_MODULUS);
  }
  return state;
}

/** Number in `[min, max]` drawn from the generator output. */
export function randomNumber(
  min: number,
  max: number,
  seed: number | bigint = DEFAULT_SEED,
  rounds = DEFAULT_ROUNDS,
): number {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || max < min) {
    throw new RangeError(`invalid range [${min}, ${max}]`);
  }
  const span = BigInt(max - min + 1);
  return min + Number(linearCongruentGenerator(rounds, seed) % span);
}

/** The single-byte XOR key every literal of a build is masked with. */
export function deriveKey(seed: number | bigint = DEFAULT_SEED, rounds = DEFAULT_ROUNDS): number {
  return randomNumber(0, 0xFF, seed, rounds);
}
