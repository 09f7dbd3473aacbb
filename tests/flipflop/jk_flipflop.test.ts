import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { JKFlipflop } from '../../src/flipflop/jkFlipflop';

// Present J/K while CLK is low, then raise CLK.
function edge(ff: JKFlipflop, j: boolean, k: boolean): void {
  ff.update(false, j, k);
  ff.update(true, j, k);
}

describe('JKFlipflop', () => {
  it('holds, sets, resets and toggles', () => {
    const ff = new JKFlipflop();
    expect(ff.q()).toBe(false);

    // Rising then falling edge with J and K low
    ff.update(true, false, false);
    expect(ff.q()).toBe(false);
    ff.update(false, false, false);
    expect(ff.q()).toBe(false);

    // J high without a clock edge
    ff.update(false, true, false);
    expect(ff.q()).toBe(false);

    // Rising edge with J high
    ff.update(true, true, false);
    expect(ff.q()).toBe(true);

    // Falling edge
    ff.update(false, true, false);
    expect(ff.q()).toBe(true);

    // K high without a clock edge
    ff.update(false, false, true);
    expect(ff.q()).toBe(true);

    // Rising edge with K high
    ff.update(true, false, true);
    expect(ff.q()).toBe(false);

    // Falling edge with J and K high
    ff.update(false, true, true);
    expect(ff.q()).toBe(false);

    // Rising edge with J and K high toggles
    ff.update(true, true, true);
    expect(ff.q()).toBe(true);
  });

  it('J=K=1 alternates Q on every rising edge', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 64 }), (edges) => {
        const ff = new JKFlipflop();
        let expected = false;
        for (let i = 0; i < edges; i++) {
          edge(ff, true, true);
          expected = !expected;
          expect(ff.q()).toBe(expected);
          expect(ff.qn()).toBe(!expected);
        }
      }),
      { numRuns: 50 }
    );
  });

  it('J=K=0 keeps Q across arbitrary clocking', () => {
    fc.assert(
      fc.property(fc.boolean(), fc.array(fc.boolean(), { maxLength: 64 }), (start, clocks) => {
        const ff = new JKFlipflop();
        if (start) edge(ff, true, false);
        for (const clk of clocks) {
          ff.update(clk, false, false);
          expect(ff.q()).toBe(start);
        }
      }),
      { numRuns: 100 }
    );
  });

  it('clear delegates to the inner flip-flop', () => {
    const ff = new JKFlipflop();
    edge(ff, true, false);
    expect(ff.q()).toBe(true);
    ff.clear();
    expect(ff.q()).toBe(false);
    expect(ff.qn()).toBe(true);
  });
});
