import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { runProgram } from '@core/harness/headless';
import { loadProgramFile } from '@core/program/image';

function run(name: string) {
  return runProgram(loadProgramFile(path.resolve('programs', name)), { maxCycles: 10_000 });
}

describe('sample programs', () => {
  it('print8', () => {
    const r = run('print8.ls8');
    expect(r.reason).toBe('halted');
    expect(r.output).toEqual([8]);
    expect(r.state.pc).toBe(6);
  });

  it('mult', () => {
    expect(run('mult.ls8').output).toEqual([72]);
  });

  it('stack', () => {
    const r = run('stack.ls8');
    expect(r.output).toEqual([2, 4, 1]);
    expect(r.state.reg[7]).toBe(0xF4);
  });

  it('call', () => {
    const r = run('call.ls8');
    expect(r.output).toEqual([40, 60]);
    expect(r.state.pc).toBe(14);
    expect(r.diagnostics).toEqual([]);
  });

  it('branch', () => {
    const r = run('branch.ls8');
    expect(r.output).toEqual([1, 2]);
    expect(r.state.pc).toBe(43);
  });
});

describe('headless runner', () => {
  it('turns a fatal ALU error into a fault result', () => {
    const r = runProgram(Uint8Array.from([0b10100001, 0, 1]), { maxCycles: 100 });
    expect(r.reason).toBe('fault');
    expect(r.message).toBe('unsupported ALU operation 1 at pc=0');
    expect(r.cycles).toBe(1);
  });

  it('collects non-fatal diagnostics', () => {
    const r = runProgram(Uint8Array.from([0b00000000, 0b00000001]), { maxCycles: 100 });
    expect(r.reason).toBe('halted');
    expect(r.diagnostics).toEqual(['unknown opcode 0b00000000 at pc=0']);
  });

  it('reports runaway programs', () => {
    const r = runProgram(Uint8Array.from([0b10000010, 0, 3, 0b01010100, 0]), { maxCycles: 50 });
    expect(r.reason).toBe('cycle-limit');
    expect(r.cycles).toBe(50);
  });
});
