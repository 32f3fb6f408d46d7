import type { RAM } from '@core/bus/ram';
import { UnknownOpcodeError, UnsupportedAluOperationError } from '@core/errors/errors';
import type { LS8Error } from '@core/errors/errors';
import { decode, instructionLength } from './decode';
import { Flags } from './flags';
import { formatTraceLine } from './trace';
import { REGISTER_COUNT, SP, SP_INIT } from './types';
import type { Address, Byte, CPUState, DecodedInstruction, RunResult } from './types';
import { lookup } from './units/context';
import type { ExecContext, UnitTable } from './units/context';
import { ALU_UNIT } from './units/alu';
import { CORE_UNIT } from './units/core';
import { FLOW_UNIT } from './units/flow';

export type OutputHook = (value: Byte) => void;
export type DiagnosticHook = (err: LS8Error) => void;
export type TraceHook = (line: string) => void;

export interface RunOptions {
  maxCycles?: number;
}

export class LS8CPU implements ExecContext {
  readonly reg = new Uint8Array(REGISTER_COUNT);
  readonly flags = new Flags();
  pc: Address = 0;
  ir: Byte = 0;
  running = false;
  cycles = 0;

  private outputHook: OutputHook = (v) => {
    // eslint-disable-next-line no-console
    console.log(String(v));
  };
  private diagnosticHook: DiagnosticHook = (err) => {
    // eslint-disable-next-line no-console
    console.error(`[ls8] ${err.message}`);
  };
  private traceHook: TraceHook | null = null;

  constructor(readonly bus: RAM) {
    this.reset();
  }

  // PRN sink, non-fatal error sink, and an optional per-cycle trace line
  setOutputHook(fn: OutputHook) { this.outputHook = fn; }
  setDiagnosticHook(fn: DiagnosticHook) { this.diagnosticHook = fn; }
  setTraceHook(fn: TraceHook | null) { this.traceHook = fn; }

  get state(): CPUState {
    return { pc: this.pc, ir: this.ir, reg: this.reg.slice(), fl: this.flags.value, running: this.running, cycles: this.cycles };
  }

  reset() {
    this.reg.fill(0);
    this.reg[SP] = SP_INIT;
    this.flags.reset();
    this.pc = 0;
    this.ir = 0;
    this.running = false;
    this.cycles = 0;
  }

  clearMemory() { this.bus.clear(); }

  emit(value: Byte) { this.outputHook(value & 0xFF); }
  report(err: LS8Error) { this.diagnosticHook(err); }

  trace(): string {
    return formatTraceLine(this.pc, (a) => this.bus.peek(a), this.reg);
  }

  /** Runs until HLT, a fatal error (thrown), or `maxCycles` cycles. */
  run(opts: RunOptions = {}): RunResult {
    const limit = opts.maxCycles ?? Number.POSITIVE_INFINITY;
    const start = this.cycles;
    this.running = true;
    while (this.running) {
      if (this.cycles - start >= limit) {
        this.running = false;
        return { cycles: this.cycles - start, reason: 'cycle-limit' };
      }
      this.step();
    }
    return { cycles: this.cycles - start, reason: 'halted' };
  }

  // One fetch-decode-execute cycle
  step() {
    if (this.traceHook) this.traceHook(this.trace());
    const pc = this.pc;
    this.cycles++;

    const fetched = this.bus.read(pc);
    if (!fetched.ok) {
      this.report(fetched.error);
      this.ir = 0;
      this.pc = pc + 1;
      return;
    }
    this.ir = fetched.value;
    const d = decode(this.ir);
    const a = this.fetchOperand(pc + 1, d.operandCount >= 1);
    const b = this.fetchOperand(pc + 2, d.operandCount >= 2);

    if (d.setsPc) {
      if (this.dispatch(FLOW_UNIT, d, a, b)) return;
      // Unknown flow opcode: nothing claimed the PC, so advance it here
    } else if (d.isAlu) {
      const hit = lookup(ALU_UNIT, d.selector);
      if (!hit.found) {
        this.running = false;
        throw new UnsupportedAluOperationError(d.selector, pc);
      }
      hit.entry.handler(this, a, b, d);
    } else {
      this.dispatch(CORE_UNIT, d, a, b);
    }
    this.pc = pc + instructionLength(d);
  }

  private dispatch(unit: UnitTable, d: DecodedInstruction, a: Byte, b: Byte): boolean {
    const hit = lookup(unit, d.selector);
    if (!hit.found) {
      this.report(new UnknownOpcodeError(d.opcode, this.pc));
      return false;
    }
    hit.entry.handler(this, a, b, d);
    return true;
  }

  // Bytes beyond the decoded operand count are read speculatively and never reported
  private fetchOperand(addr: Address, needed: boolean): Byte {
    const res = this.bus.read(addr);
    if (res.ok) return res.value;
    if (needed) this.report(res.error);
    return 0;
  }
}
