import { and } from '../logic/gates';
import type { Complementary, Resettable, Signal } from '../logic/types';
import { bit, Tracer, type TraceOptions } from '../utils/trace';
import { SRFlipflop } from './srFlipflop';

// Rising-edge triggered JK flip-flop: J=K=0 holds, J sets, K resets, J=K=1 toggles.
export class JKFlipflop implements Complementary, Resettable {
  private readonly sr: SRFlipflop;
  private readonly tracer: Tracer;

  constructor(opts: TraceOptions = {}) {
    this.tracer = new Tracer('JKFF', opts);
    // The inner flip-flop's own trace would duplicate ours.
    this.sr = new SRFlipflop({ ...opts, trace: false });
  }

  update(clk: Signal, j: Signal, k: Signal): void {
    // Gate J/K with the current outputs before applying them; Q and Qn are
    // complementary, so S and R are never high together.
    const s = and([j, this.sr.qn()]);
    const r = and([k, this.sr.q()]);
    this.sr.update(clk, s, r);
    this.tracer.log(() => `clk=${bit(clk)} j=${bit(j)} k=${bit(k)} -> Q=${bit(this.q())} Qn=${bit(this.qn())}`);
  }

  clear(): void {
    this.sr.clear();
  }

  q(): Signal { return this.sr.q(); }

  qn(): Signal { return this.sr.qn(); }
}
