export type Signal = boolean;

// Every latch and flip-flop exposes a complementary output pair; qn() === !q() after any call.
export interface Complementary {
  q(): Signal;
  qn(): Signal;
}

export interface Resettable {
  clear(): void; // force the reset state (Q=false)
}

export interface Clocked {
  update(clk: Signal): void; // apply one clock level
}
