import type { Clocked, Resettable, Signal } from '../logic/types';
import { DFlipflop } from '../flipflop/dFlipflop';
import { U64, type ConversionError, type IntegerType } from '../numeric/intTypes';
import type { Result } from '../numeric/result';
import { Tracer, type TraceOptions } from '../utils/trace';

export const MAX_COUNTER_WIDTH = 64;

export type RippleCounterOptions = TraceOptions;

/**
 * Asynchronous (ripple) up-counter of `width` bits, least significant bit first.
 *
 * Every stage is a D flip-flop fed its own Qn, so each rising edge on its clock flips it.
 * Bit 0 is clocked externally; bit i is clocked by bit i-1's Qn, which rises when bit i-1
 * falls from 1 to 0. Stages are updated in index order within one call, so a carry
 * ripples through the whole chain before update() returns. The count wraps at 2^width.
 */
export class RippleCounter<N extends number = number> implements Clocked, Resettable {
  private readonly flipflops: readonly DFlipflop[];
  private readonly tracer: Tracer;

  constructor(readonly width: N, opts: RippleCounterOptions = {}) {
    if (!Number.isInteger(width) || width < 1 || width > MAX_COUNTER_WIDTH) {
      throw new RangeError(`Counter width must be an integer in [1, ${MAX_COUNTER_WIDTH}], got ${width}`);
    }
    this.tracer = new Tracer('COUNTER', opts, ['LOGIC_TRACE', 'COUNTER_TRACE']);
    const stageOpts: TraceOptions = opts.trace === false ? { env: opts.env, trace: false } : { env: opts.env };
    this.flipflops = Array.from({ length: width }, () => new DFlipflop(stageOpts));
    this.init();
  }

  update(clk: Signal): void {
    const ffs = this.flipflops;
    ffs[0].update(clk, ffs[0].qn());
    for (let i = 1; i < ffs.length; i++) {
      ffs[i].update(ffs[i - 1].qn(), ffs[i].qn());
    }
    this.tracer.log(() => `clk=${clk ? 1 : 0} bits=${this.bitString()} value=${this.accumulate()}`);
  }

  clear(): void {
    for (const ff of this.flipflops) ff.clear();
    this.init();
  }

  bits(): Signal[] {
    return this.flipflops.map((ff) => ff.q());
  }

  value(): Result<bigint, ConversionError>;
  value<T>(type: IntegerType<T>): Result<T, ConversionError>;
  value(type: IntegerType<unknown> = U64): Result<unknown, ConversionError> {
    return type.tryFrom(this.accumulate());
  }

  // Clock held low first: raising CLK and D together would race the master/slave pair.
  private init(): void {
    this.update(false);
  }

  private accumulate(): bigint {
    let acc = 0n;
    for (let i = 0; i < this.flipflops.length; i++) {
      if (this.flipflops[i].q()) acc |= 1n << BigInt(i);
    }
    return acc;
  }

  // MSB first, as a binary literal reads
  private bitString(): string {
    let s = '';
    for (let i = this.flipflops.length - 1; i >= 0; i--) s += this.flipflops[i].q() ? '1' : '0';
    return s;
  }
}
