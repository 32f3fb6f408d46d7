import { decode, instructionLength } from '@core/cpu/decode';
import { Op } from '@core/cpu/opcodes';
import type { Mnemonic } from '@core/cpu/opcodes';
import type { PeekFn } from '@core/cpu/trace';
import type { Address, Byte } from '@core/cpu/types';

type OperandForm = 'none' | 'reg' | 'reg,imm' | 'reg,reg';

const FORMS: Record<Mnemonic, OperandForm> = {
  HLT: 'none', LDI: 'reg,imm', PUSH: 'reg', POP: 'reg', PRN: 'reg',
  ADD: 'reg,reg', MUL: 'reg,reg', CMP: 'reg,reg',
  CALL: 'reg', RET: 'none', JMP: 'reg', JEQ: 'reg', JNE: 'reg',
};

function isMnemonic(s: string): s is Mnemonic { return s in FORMS; }

const BY_OPCODE = new Map<Byte, Mnemonic>();
for (const [name, code] of Object.entries(Op)) {
  if (isMnemonic(name)) BY_OPCODE.set(code, name);
}

function hex2(v: number) { return v.toString(16).toUpperCase().padStart(2, '0'); }

export interface DisasmResult {
  bytes: number[];
  mnemonic: string;
  operand: string;
  len: number;
}

function formatOperand(form: OperandForm, b1: Byte, b2: Byte): string {
  switch (form) {
    case 'none': return '';
    case 'reg': return `R${b1 & 0x07}`;
    case 'reg,imm': return `R${b1 & 0x07},${b2}`;
    case 'reg,reg': return `R${b1 & 0x07},R${b2 & 0x07}`;
  }
}

export function disasmAt(peek: PeekFn, pc: Address): DisasmResult {
  const op = peek(pc) ?? 0;
  const len = instructionLength(decode(op));
  const bytes = [op, peek(pc + 1) ?? 0, peek(pc + 2) ?? 0].slice(0, Math.min(len, 3));
  const name = BY_OPCODE.get(op);
  if (!name) return { bytes, mnemonic: '???', operand: '$' + hex2(op), len };
  return { bytes, mnemonic: name, operand: formatOperand(FORMS[name], bytes[1] ?? 0, bytes[2] ?? 0), len };
}

// "03  47 00     PRN R0"
export function formatDisasmLine(pc: Address, res: DisasmResult): string {
  const bytesStr = res.bytes.map(hex2).join(' ').padEnd(10, ' ');
  return `${hex2(pc)}  ${bytesStr}${(res.mnemonic + ' ' + res.operand).trim()}`;
}

// Linear sweep over an image; stops at the end of the data
export function disassemble(image: Uint8Array): string[] {
  const peek: PeekFn = (a) => (a >= 0 && a < image.length ? image[a] : null);
  const lines: string[] = [];
  let pc = 0;
  while (pc < image.length) {
    const res = disasmAt(peek, pc);
    lines.push(formatDisasmLine(pc, res));
    pc += res.len;
  }
  return lines;
}
