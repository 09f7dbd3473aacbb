export type { Signal, Complementary, Resettable, Clocked } from './logic/types';
export { not, and, or, xor, nand, nor, xnor } from './logic/gates';
export { DLatch } from './latch/dLatch';
export { GatedSRLatch } from './latch/gatedSrLatch';
export { DFlipflop } from './flipflop/dFlipflop';
export { SRFlipflop } from './flipflop/srFlipflop';
export { JKFlipflop } from './flipflop/jkFlipflop';
export { RippleCounter, MAX_COUNTER_WIDTH, type RippleCounterOptions } from './counter/rippleCounter';
export { MasterClock } from './timing/masterClock';
export {
  ConversionError, U8, U16, U32, U64, I8, I16, I32, I64, SafeInteger, type IntegerType,
} from './numeric/intTypes';
export { ok, err, unwrap, type Result } from './numeric/result';
export { Tracer, type TraceOptions, type Env } from './utils/trace';
