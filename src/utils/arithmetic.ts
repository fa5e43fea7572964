import { ConditionFlag } from '../constants/flags';

const SIGN_BIT = 1 << 15;

export function wrap16(n: number): number {
  return n & 0xffff;
}

/**
 * Widens the low `bitCount` bits of `x` from two's complement to a 16-bit
 * word, copying the sign bit into every higher bit.
 */
export function signExtend(x: number, bitCount: number): number {
  const m = 1 << (bitCount - 1);
  x &= (1 << bitCount) - 1;
  return wrap16((x ^ m) - m);
}

export function toSigned16(word: number): number {
  return word & SIGN_BIT ? (word & 0xffff) - 0x10000 : word & 0xffff;
}

export function conditionFor(word: number): ConditionFlag {
  if (wrap16(word) === 0) {
    return ConditionFlag.FL_ZRO;
  }
  /* a 1 in the left-most bit indicates negative */
  if (word & SIGN_BIT) {
    return ConditionFlag.FL_NEG;
  }
  return ConditionFlag.FL_POS;
}
