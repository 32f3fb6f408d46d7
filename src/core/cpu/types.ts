export type Byte = number; // 0..255
export type Address = number; // 0..MEMORY_SIZE-1 when valid

export const MEMORY_SIZE = 256;
export const REGISTER_COUNT = 8;
export const SP = 7; // R7 is the stack pointer
export const SP_INIT = 0xF4;

export interface CPUState {
  pc: Address;
  ir: Byte; // opcode of the current/last cycle
  reg: Uint8Array; // R0..R7, R7 = SP
  fl: Byte; // 00000LGE
  running: boolean;
  cycles: number;
}

// Fields derived purely from the opcode byte: AABCDDDD, selector = low 3 bits
export interface DecodedInstruction {
  opcode: Byte;
  operandCount: number; // bits 7-6
  isAlu: boolean; // bit 5
  setsPc: boolean; // bit 4
  selector: number; // bits 2-0
}

export interface RunResult {
  cycles: number;
  reason: 'halted' | 'cycle-limit' | 'fault';
  message?: string;
}
