import type { Byte, CPUState, RunResult } from '@core/cpu/types';
import type { LS8Error } from '@core/errors/errors';
import { LS8System } from '@core/system/system';

export interface HeadlessResult extends RunResult {
  output: Byte[];
  diagnostics: string[];
  state: CPUState;
}

// Run an image to completion with output and diagnostics captured instead of printed
export function runProgram(image: Uint8Array, opts: { maxCycles: number }): HeadlessResult {
  const sys = new LS8System({ maxCycles: opts.maxCycles });
  const output: Byte[] = [];
  const diagnostics: string[] = [];
  sys.cpu.setOutputHook((v) => output.push(v));
  sys.cpu.setDiagnosticHook((err: LS8Error) => diagnostics.push(err.message));
  sys.load(image);

  const done = (r: RunResult): HeadlessResult => ({ ...r, output, diagnostics, state: sys.cpu.state });
  try {
    return done(sys.run());
  } catch (e) {
    return done({ cycles: sys.cpu.cycles, reason: 'fault', message: e instanceof Error ? e.message : String(e) });
  }
}
