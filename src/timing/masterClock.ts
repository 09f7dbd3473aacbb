import type { Clocked } from '../logic/types';

// Drives a clocked component with complete pulses: CLK high, then CLK low.
export class MasterClock {
  private delivered = 0;

  constructor(private readonly target: Clocked) {}

  get pulses(): number {
    return this.delivered;
  }

  pulse(): void {
    this.target.update(true);
    this.target.update(false);
    this.delivered++;
  }

  run(pulses: number): void {
    if (!Number.isFinite(pulses)) return;
    const n = Math.trunc(pulses);
    for (let i = 0; i < n; i++) this.pulse();
  }

  resetCount(): void {
    this.delivered = 0;
  }
}
