export interface MachineOptions {
  trace: boolean;
  maxCycles: number;
}

export const DEFAULT_OPTIONS: MachineOptions = {
  trace: false,
  maxCycles: 100_000,
};

export type EnvLike = Readonly<Record<string, string | undefined>>;

function parseCycles(s: string | undefined, fallback: number): number {
  if (!s || !/^\d+$/.test(s)) return fallback;
  const n = parseInt(s, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

// LS8_TRACE=1 turns on the per-cycle trace, LS8_MAX_CYCLES bounds a run
export function readOptionsFromEnv(env: EnvLike, base: MachineOptions = DEFAULT_OPTIONS): MachineOptions {
  return {
    trace: env.LS8_TRACE !== undefined ? env.LS8_TRACE === '1' : base.trace,
    maxCycles: parseCycles(env.LS8_MAX_CYCLES, base.maxCycles),
  };
}

// --trace, --max-cycles=N override whatever the environment said
export function applyArgs(argv: readonly string[], base: MachineOptions): { options: MachineOptions; rest: string[] } {
  const options = { ...base };
  const rest: string[] = [];
  for (const a of argv) {
    if (a === '--trace') options.trace = true;
    else if (a.startsWith('--max-cycles=')) options.maxCycles = parseCycles(a.slice(13), base.maxCycles);
    else rest.push(a);
  }
  return { options, rest };
}
