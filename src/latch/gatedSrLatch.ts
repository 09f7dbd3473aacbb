import { and, not, or } from '../logic/gates';
import type { Complementary, Resettable, Signal } from '../logic/types';

/**
 * Gated SR latch. While enabled, S sets and R resets; with both low it holds.
 * Disabled, it ignores S and R entirely.
 *
 * S and R high together while enabled is unspecified. Callers must not produce it;
 * the JK flip-flop derives its S/R so that it never does.
 */
export class GatedSRLatch implements Complementary, Resettable {
  private stored: Signal = false;

  set(s: Signal, enable: Signal, r: Signal): void {
    const setGated = and([s, enable]);
    const resetGated = and([r, enable]);
    this.stored = or([setGated, and([this.stored, not(resetGated)])]);
  }

  clear(): void {
    this.stored = false;
  }

  q(): Signal { return this.stored; }

  qn(): Signal { return not(this.stored); }
}
