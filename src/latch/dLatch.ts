import { and, not, or } from '../logic/gates';
import type { Complementary, Resettable, Signal } from '../logic/types';

// Level-sensitive D latch: transparent while enabled, holds while disabled.
export class DLatch implements Complementary, Resettable {
  private stored: Signal = false;

  set(enable: Signal, data: Signal): void {
    // Q+ = E·D + ¬E·Q
    this.stored = or([and([enable, data]), and([not(enable), this.stored])]);
  }

  clear(): void {
    this.stored = false;
  }

  q(): Signal { return this.stored; }

  qn(): Signal { return not(this.stored); }
}
