import { describe, it, expect } from 'vitest';
import { and, nand, nor, not, or, xnor, xor } from '../../src/logic/gates';

const pairs: [boolean, boolean][] = [[false, false], [false, true], [true, false], [true, true]];

describe('Gate library', () => {
  it('not inverts', () => {
    expect(not(false)).toBe(true);
    expect(not(true)).toBe(false);
  });

  it('2-input gates follow their truth tables', () => {
    const table = pairs.map(([a, b]) => [and([a, b]), or([a, b]), xor([a, b]), nand([a, b]), nor([a, b]), xnor([a, b])]);
    expect(table).toEqual([
      [false, false, false, true, true, true],
      [false, true, true, true, false, false],
      [false, true, true, true, false, false],
      [true, true, false, false, false, true],
    ]);
  });

  it('n-ary reductions', () => {
    expect(and([true, true, true, true])).toBe(true);
    expect(and([true, true, false, true])).toBe(false);
    expect(or([false, false, false, true])).toBe(true);
    expect(xor([true, true, true])).toBe(true); // odd parity
    expect(xor([true, true, false, false])).toBe(false);
  });

  it('empty inputs reduce to the identity element', () => {
    expect(and([])).toBe(true);
    expect(or([])).toBe(false);
    expect(xor([])).toBe(false);
    expect(nand([])).toBe(false);
    expect(nor([])).toBe(true);
  });
});
