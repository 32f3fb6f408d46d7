// Full opcode bytes. Selector (low 3 bits) is unique within each unit.
export const Op = {
  // core control
  HLT: 0b00000001,
  LDI: 0b10000010,
  PUSH: 0b01000101,
  POP: 0b01000110,
  PRN: 0b01000111,
  // ALU
  ADD: 0b10100000,
  MUL: 0b10100010,
  CMP: 0b10100111,
  // flow control
  CALL: 0b01010000,
  RET: 0b00010001,
  JMP: 0b01010100,
  JEQ: 0b01010101,
  JNE: 0b01010110,
} as const;

export type Mnemonic = keyof typeof Op;
