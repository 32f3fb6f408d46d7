import type { Address, Byte } from '@core/cpu/types';

export type LS8ErrorKind =
  | 'out-of-bounds'
  | 'unknown-opcode'
  | 'unsupported-alu-op'
  | 'stack'
  | 'program-load';

export class LS8Error extends Error {
  constructor(readonly kind: LS8ErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Non-fatal: the access is skipped and the loop keeps running
export class OutOfBoundsError extends LS8Error {
  constructor(readonly address: Address, readonly access: 'read' | 'write') {
    super('out-of-bounds', `${access} out of bounds at address ${address}`);
  }
}

// Non-fatal: reported, PC still advances by the decoded length
export class UnknownOpcodeError extends LS8Error {
  constructor(readonly opcode: Byte, readonly pc: Address) {
    super('unknown-opcode', `unknown opcode 0b${opcode.toString(2).padStart(8, '0')} at pc=${pc}`);
  }
}

// Fatal: thrown out of run()/step()
export class UnsupportedAluOperationError extends LS8Error {
  constructor(readonly selector: number, readonly pc: Address) {
    super('unsupported-alu-op', `unsupported ALU operation ${selector} at pc=${pc}`);
  }
}

export class StackError extends LS8Error {
  constructor(readonly op: 'push' | 'pop', readonly sp: Byte) {
    super('stack', op === 'push' ? `stack overflow: cannot push with SP=${sp}` : `stack underflow: cannot pop with SP=${sp}`);
  }
}

export class ProgramLoadError extends LS8Error {
  constructor(message: string, readonly line?: number) {
    super('program-load', line !== undefined ? `line ${line}: ${message}` : message);
  }
}
