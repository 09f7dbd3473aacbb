import { not } from '../logic/gates';
import type { Complementary, Resettable, Signal } from '../logic/types';
import { GatedSRLatch } from '../latch/gatedSrLatch';
import { bit, Tracer, type TraceOptions } from '../utils/trace';

/**
 * Rising-edge triggered SR flip-flop. Same master/slave enabling as DFlipflop; the
 * slave's S/R are driven from the master's Q/Qn so it always follows the master.
 * S and R high together is unspecified (see GatedSRLatch).
 */
export class SRFlipflop implements Complementary, Resettable {
  private readonly master = new GatedSRLatch();
  private readonly slave = new GatedSRLatch();
  private readonly tracer: Tracer;

  constructor(opts: TraceOptions = {}) {
    this.tracer = new Tracer('SRFF', opts);
    this.settle();
  }

  update(clk: Signal, s: Signal, r: Signal): void {
    this.master.set(s, not(clk), r);
    this.slave.set(this.master.q(), clk, this.master.qn());
    this.tracer.log(() => `clk=${bit(clk)} s=${bit(s)} r=${bit(r)} -> Q=${bit(this.q())} Qn=${bit(this.qn())}`);
  }

  clear(): void {
    this.master.clear();
    this.slave.clear();
    this.settle();
  }

  q(): Signal { return this.slave.q(); }

  qn(): Signal { return this.slave.qn(); }

  private settle(): void {
    this.update(false, false, false);
  }
}
