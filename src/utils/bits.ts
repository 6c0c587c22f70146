import { ConditionFlag } from '../hardware/register';

const SIGN_BIT = 1 << 15;

/**
 * Treats the low `bitCount` bits of `x` as a two's complement number and
 * widens it to 16 bits.
 */
export function signExtend(x: number, bitCount: number): number {
  const m = 1 << (bitCount - 1);
  x &= (1 << bitCount) - 1;
  return ((x ^ m) - m) & 0xffff;
}

export function conditionFor(value: number): ConditionFlag {
  if ((value & 0xffff) === 0) {
    return ConditionFlag.FL_ZRO;
  }
  /* a 1 in the left-most bit indicates negative */
  if ((value & SIGN_BIT) >> 15) {
    return ConditionFlag.FL_NEG;
  }
  return ConditionFlag.FL_POS;
}
