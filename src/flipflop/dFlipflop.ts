import { not } from '../logic/gates';
import type { Complementary, Resettable, Signal } from '../logic/types';
import { DLatch } from '../latch/dLatch';
import { bit, Tracer, type TraceOptions } from '../utils/trace';

/**
 * Rising-edge triggered D flip-flop built from a master/slave pair of D latches.
 *
 * The master is transparent only while CLK is low and the slave only while CLK is high,
 * so the two are never transparent together. Q therefore changes only when CLK goes
 * from low to high between two calls, taking the D value seen while CLK was still low.
 * D must be in place before CLK rises.
 */
export class DFlipflop implements Complementary, Resettable {
  private readonly master = new DLatch();
  private readonly slave = new DLatch();
  private readonly tracer: Tracer;

  constructor(opts: TraceOptions = {}) {
    this.tracer = new Tracer('DFF', opts);
    this.settle();
  }

  update(clk: Signal, d: Signal): void {
    this.master.set(not(clk), d);
    this.slave.set(clk, this.master.q());
    this.tracer.log(() => `clk=${bit(clk)} d=${bit(d)} -> Q=${bit(this.q())} Qn=${bit(this.qn())}`);
  }

  clear(): void {
    this.master.clear();
    this.slave.clear();
    this.settle();
  }

  q(): Signal { return this.slave.q(); }

  qn(): Signal { return this.slave.qn(); }

  // Hold CLK low so the latches leave reset without a simultaneous high CLK and D.
  private settle(): void {
    this.update(false, false);
  }
}
