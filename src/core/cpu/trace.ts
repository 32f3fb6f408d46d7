import type { Address, Byte } from './types';

export type PeekFn = (addr: Address) => Byte | null;

function hex2(v: Byte | null): string {
  return v === null ? '--' : (v & 0xFF).toString(16).toUpperCase().padStart(2, '0');
}

// TRACE: PC | next three bytes | R0..R7
export function formatTraceLine(pc: Address, peek: PeekFn, reg: ArrayLike<Byte>): string {
  const bytes = [peek(pc), peek(pc + 1), peek(pc + 2)].map(hex2).join(' ');
  const regs = Array.from(reg, (v) => ' ' + hex2(v)).join('');
  return `TRACE: ${hex2(pc)} | ${bytes} |${regs}`;
}
