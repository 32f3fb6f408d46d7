import type { Byte, DecodedInstruction } from './types';

// Instruction layout: AABCDDDD
//   AA   operand count
//   B    ALU op
//   C    sets PC (flow unit owns the PC advance)
//   DDDD instruction identifier; the units dispatch on the low 3 bits
export function decode(opcode: Byte): DecodedInstruction {
  const op = opcode & 0xFF;
  return {
    opcode: op,
    operandCount: (op >>> 6) & 0x03,
    isAlu: (op & 0x20) !== 0,
    setsPc: (op & 0x10) !== 0,
    selector: op & 0x07,
  };
}

export function instructionLength(d: DecodedInstruction): number {
  return 1 + d.operandCount;
}
