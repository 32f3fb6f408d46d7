import type { RAM } from '@core/bus/ram';
import type { LS8Error } from '@core/errors/errors';
import type { Mnemonic } from '../opcodes';
import type { Flags } from '../flags';
import type { Address, Byte, DecodedInstruction } from '../types';

// What an execution unit may touch. The CPU implements this directly.
export interface ExecContext {
  readonly bus: RAM;
  readonly reg: Uint8Array;
  readonly flags: Flags;
  pc: Address;
  running: boolean;
  emit(value: Byte): void;
  report(err: LS8Error): void;
}

// Operands are the two bytes after the opcode; unused ones are 0 or whatever followed
export type Handler = (ctx: ExecContext, a: Byte, b: Byte, d: DecodedInstruction) => void;

export interface UnitEntry {
  name: Mnemonic;
  handler: Handler;
}

export type UnitTable = ReadonlyMap<number, UnitEntry>;

export type Lookup = { found: true; entry: UnitEntry } | { found: false };

export function lookup(table: UnitTable, selector: number): Lookup {
  const entry = table.get(selector);
  return entry ? { found: true, entry } : { found: false };
}

export function table(entries: Array<[number, Mnemonic, Handler]>): UnitTable {
  return new Map(entries.map(([sel, name, handler]) => [sel, { name, handler }]));
}

// Operand bytes name registers R0..R7
export const r = (operand: Byte): number => operand & 0x07;
