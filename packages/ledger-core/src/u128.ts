export const MAX_U128 = (1n << 128n) - 1n;

export function isU128(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= MAX_U128;
}

export function assertU128(value: bigint, field: string): void {
  if (value < 0n || value > MAX_U128) {
    throw new RangeError(`${field} must be an unsigned 128-bit integer, got ${value.toString()}`);
  }
}

export function saturatingAdd(a: bigint, b: bigint, max: bigint = MAX_U128): bigint {
  const sum = a + b;
  return sum > max ? max : sum;
}

export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

/** Returns null instead of exceeding `max`. */
export function checkedAdd(a: bigint, b: bigint, max: bigint = MAX_U128): bigint | null {
  const sum = a + b;
  return sum > max ? null : sum;
}

export function minU128(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
