/**
 * GF(2^8) arithmetic for threshold secret sharing
 *
 * Elements are bytes. Addition is XOR; multiplication is polynomial
 * multiplication modulo x^8 + x^4 + x^3 + x + 1 (0x11B), the field used by
 * the TSS share format. Multiplication and inversion go through exp/log
 * tables built from the generator 0x03.
 *
 * Table lookups are data dependent, so none of this is constant-time.
 */

/** Irreducible reduction polynomial x^8 + x^4 + x^3 + x + 1 */
export const REDUCTION_POLYNOMIAL = 0x11b;

/** Generator of the multiplicative group */
export const GENERATOR = 0x03;

/** Order of the multiplicative group */
export const GROUP_ORDER = 255;

/**
 * Carry-less multiply of two bytes, reduced by the field polynomial.
 * Only used to build the tables.
 */
function slowMul(a: number, b: number): number {
  let result = 0;
  while (b > 0) {
    if (b & 1) result ^= a;
    a <<= 1;
    if (a & 0x100) a ^= REDUCTION_POLYNOMIAL;
    b >>= 1;
  }
  return result;
}

interface Tables {
  /** exp[i] = g^i, doubled so exp[log a + log b] needs no reduction */
  readonly exp: Uint8Array;
  /** log[a] for a != 0; log[0] is unused */
  readonly log: Uint8Array;
}

function buildTables(): Tables {
  const exp = new Uint8Array(GROUP_ORDER * 2);
  const log = new Uint8Array(256);

  let x = 1;
  for (let i = 0; i < GROUP_ORDER; i++) {
    exp[i] = x;
    exp[i + GROUP_ORDER] = x;
    log[x] = i;
    x = slowMul(x, GENERATOR);
  }

  return { exp, log };
}

const TABLES: Tables = buildTables();

function assertElement(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new RangeError(`${name} must be a field element in [0, 255], got ${value}`);
  }
}

/**
 * Field addition (XOR)
 */
export function add(a: number, b: number): number {
  assertElement(a, 'a');
  assertElement(b, 'b');
  return a ^ b;
}

/**
 * Field subtraction. Identical to addition in characteristic 2.
 */
export function sub(a: number, b: number): number {
  return add(a, b);
}

/**
 * Field multiplication via log/exp tables
 */
export function mul(a: number, b: number): number {
  assertElement(a, 'a');
  assertElement(b, 'b');
  if (a === 0 || b === 0) return 0;
  return TABLES.exp[TABLES.log[a]! + TABLES.log[b]!]!;
}

/**
 * Multiplicative inverse. Throws for 0, which has none.
 */
export function inverse(a: number): number {
  assertElement(a, 'a');
  if (a === 0) {
    throw new RangeError('0 has no multiplicative inverse in GF(256)');
  }
  return TABLES.exp[GROUP_ORDER - TABLES.log[a]!]!;
}

/**
 * Field division a / b
 */
export function div(a: number, b: number): number {
  assertElement(a, 'a');
  assertElement(b, 'b');
  if (b === 0) {
    throw new RangeError('Division by zero in GF(256)');
  }
  if (a === 0) return 0;
  return TABLES.exp[TABLES.log[a]! + GROUP_ORDER - TABLES.log[b]!]!;
}

/**
 * g^i for the field generator
 */
export function exp(i: number): number {
  if (!Number.isInteger(i) || i < 0) {
    throw new RangeError(`Exponent must be a non-negative integer, got ${i}`);
  }
  return TABLES.exp[i % GROUP_ORDER]!;
}

/**
 * Discrete logarithm to the base of the generator
 */
export function log(a: number): number {
  assertElement(a, 'a');
  if (a === 0) {
    throw new RangeError('log(0) is undefined');
  }
  return TABLES.log[a]!;
}
