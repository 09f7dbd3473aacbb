import type { Signal } from '../logic/types';

export type Env = Record<string, string | undefined>;

export interface TraceOptions {
  trace?: boolean; // overrides the environment switches when set
  env?: Env;       // defaults to process.env
}

function defaultEnv(): Env {
  return typeof process !== 'undefined' && process?.env ? process.env : {};
}

export function envFlag(env: Env, name: string): boolean {
  const v = (env[name] ?? '').toLowerCase();
  return v === '1' || v === 'true';
}

export function bit(s: Signal): '0' | '1' {
  return s ? '1' : '0';
}

// Tagged console tracing, switched on by an option or any of the given env flags (LOGIC_TRACE by default).
export class Tracer {
  readonly enabled: boolean;

  constructor(readonly tag: string, opts: TraceOptions = {}, flags: readonly string[] = ['LOGIC_TRACE']) {
    const env = opts.env ?? defaultEnv();
    this.enabled = opts.trace ?? flags.some((f) => envFlag(env, f));
  }

  log(message: () => string): void {
    if (!this.enabled) return;
    // eslint-disable-next-line no-console
    console.log(`[${this.tag}] ${message()}`);
  }
}
