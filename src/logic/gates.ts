import type { Signal } from './types';

// Stateless gate functions. n-ary gates reduce over their inputs:
// and([]) is true, or([]) and xor([]) are false, xor is odd parity.

export function not(a: Signal): Signal {
  return !a;
}

export function and(inputs: readonly Signal[]): Signal {
  for (let i = 0; i < inputs.length; i++) if (!inputs[i]) return false;
  return true;
}

export function or(inputs: readonly Signal[]): Signal {
  for (let i = 0; i < inputs.length; i++) if (inputs[i]) return true;
  return false;
}

export function xor(inputs: readonly Signal[]): Signal {
  let parity = false;
  for (let i = 0; i < inputs.length; i++) parity = parity !== inputs[i];
  return parity;
}

export function nand(inputs: readonly Signal[]): Signal {
  return not(and(inputs));
}

export function nor(inputs: readonly Signal[]): Signal {
  return not(or(inputs));
}

export function xnor(inputs: readonly Signal[]): Signal {
  return not(xor(inputs));
}
