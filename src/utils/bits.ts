/**
 * Treats the low `bitCount` bits of `x` as a two's-complement number and
 * widens it to a 16-bit word.
 */
export function signExtend(x: number, bitCount: number): number {
  const m = 1 << (bitCount - 1);
  x &= (1 << bitCount) - 1;
  return ((x ^ m) - m) & 0xffff;
}

export const toHex = (value: number, length = 4): string =>
  '0x' + value.toString(16).toUpperCase().padStart(length, '0');
