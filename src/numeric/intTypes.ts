import { err, ok, type Result } from './result';

export class ConversionError extends Error {
  constructor(public readonly value: bigint, public readonly target: string) {
    super(`Value ${value} does not fit in ${target}`);
    this.name = 'ConversionError';
  }
}

// Target integer type for a narrowing conversion out of a bigint accumulator.
export interface IntegerType<T> {
  readonly name: string;
  readonly min: bigint;
  readonly max: bigint;
  tryFrom(value: bigint): Result<T, ConversionError>;
}

function numberType(name: string, min: bigint, max: bigint): IntegerType<number> {
  return {
    name,
    min,
    max,
    tryFrom: (value) => (value < min || value > max ? err(new ConversionError(value, name)) : ok(Number(value))),
  };
}

function bigintType(name: string, min: bigint, max: bigint): IntegerType<bigint> {
  return {
    name,
    min,
    max,
    tryFrom: (value) => (value < min || value > max ? err(new ConversionError(value, name)) : ok(value)),
  };
}

export const U8 = numberType('u8', 0n, 0xffn);
export const U16 = numberType('u16', 0n, 0xffffn);
export const U32 = numberType('u32', 0n, 0xffffffffn);
export const U64 = bigintType('u64', 0n, 0xffffffffffffffffn);
export const I8 = numberType('i8', -0x80n, 0x7fn);
export const I16 = numberType('i16', -0x8000n, 0x7fffn);
export const I32 = numberType('i32', -0x80000000n, 0x7fffffffn);
export const I64 = bigintType('i64', -0x8000000000000000n, 0x7fffffffffffffffn);
export const SafeInteger = numberType('safe integer', BigInt(Number.MIN_SAFE_INTEGER), BigInt(Number.MAX_SAFE_INTEGER));
