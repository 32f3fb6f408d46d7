import { describe, it, expect } from 'vitest';
import { Op } from '@core/cpu/opcodes';
import { SP, SP_INIT } from '@core/cpu/types';
import { OutOfBoundsError } from '@core/errors/errors';
import { PRINT8 } from '@core/program/demos';
import { cpuWithProgram } from '../helpers/cpuh';

describe('fetch-execute loop', () => {
  it('print8 prints 8 and halts at PC 6', () => {
    const { cpu, output } = cpuWithProgram([0b10000010, 0, 8, 0b01000111, 0, 0b00000001]);
    const res = cpu.run();
    expect(output).toEqual([8]);
    expect(res).toEqual({ cycles: 3, reason: 'halted' });
    expect(cpu.pc).toBe(6);
  });

  it('emits one trace line per cycle before it executes', () => {
    const { cpu } = cpuWithProgram(Array.from(PRINT8));
    const lines: string[] = [];
    cpu.setTraceHook((l) => lines.push(l));
    cpu.run();
    expect(lines).toEqual([
      'TRACE: 00 | 82 00 08 | 00 00 00 00 00 00 00 F4',
      'TRACE: 03 | 47 00 01 | 08 00 00 00 00 00 00 F4',
      'TRACE: 05 | 01 00 00 | 08 00 00 00 00 00 00 F4',
    ]);
  });

  it('stops at the cycle limit', () => {
    const { cpu } = cpuWithProgram([Op.LDI, 0, 3, Op.JMP, 0]);
    expect(cpu.run({ maxCycles: 10 })).toEqual({ cycles: 10, reason: 'cycle-limit' });
    expect(cpu.pc).toBe(3);
  });

  it('out-of-range accesses are reported and the loop keeps going', () => {
    const { cpu, bus, output, diagnostics } = cpuWithProgram([Op.LDI, 0, 255, Op.JMP, 0]);
    bus.write(255, Op.PRN); // its operand would be at 256
    const res = cpu.run({ maxCycles: 4 });
    expect(res.reason).toBe('cycle-limit');
    expect(output).toEqual([255]);
    expect(diagnostics.every((d) => d instanceof OutOfBoundsError)).toBe(true);
    expect(diagnostics.map((d) => d.message)).toEqual([
      'read out of bounds at address 256',
      'read out of bounds at address 257',
    ]);
    expect(cpu.pc).toBe(258);
  });

  it('speculative operand reads past the end are silent', () => {
    const { cpu, bus, diagnostics } = cpuWithProgram([Op.LDI, 0, 255, Op.JMP, 0]);
    bus.write(255, Op.HLT);
    expect(cpu.run().reason).toBe('halted');
    expect(diagnostics).toEqual([]);
    expect(cpu.pc).toBe(256);
  });

  it('reset restores registers, flags and PC but keeps memory', () => {
    const { cpu, bus } = cpuWithProgram([Op.LDI, 0, 1, Op.LDI, 1, 2, Op.CMP, 0, 1, Op.PUSH, 0, Op.HLT]);
    cpu.run();
    cpu.reset();
    expect(cpu.state).toEqual({
      pc: 0, ir: 0, reg: Uint8Array.from([0, 0, 0, 0, 0, 0, 0, SP_INIT]), fl: 0, running: false, cycles: 0,
    });
    expect(bus.peek(0)).toBe(Op.LDI);
    expect(bus.peek(SP_INIT - 1)).toBe(1);
  });

  it('clearMemory zeroes memory and leaves registers alone', () => {
    const { cpu, bus } = cpuWithProgram([Op.LDI, 0, 7, Op.HLT]);
    cpu.run();
    cpu.clearMemory();
    expect(bus.snapshot().every((v) => v === 0)).toBe(true);
    expect(cpu.reg[0]).toBe(7);
  });

  it('machines do not share state', () => {
    const a = cpuWithProgram([Op.LDI, 0, 7, Op.HLT]);
    const b = cpuWithProgram([Op.HLT]);
    a.cpu.run();
    b.cpu.run();
    expect(a.cpu.reg[0]).toBe(7);
    expect(b.cpu.reg[0]).toBe(0);
    expect(b.cpu.reg[SP]).toBe(SP_INIT);
  });
});
