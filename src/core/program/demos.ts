import { Op } from '@core/cpu/opcodes';

// LDI R0,8 / PRN R0 / HLT
export const PRINT8 = Uint8Array.from([
  Op.LDI, 0, 8,
  Op.PRN, 0,
  Op.HLT,
]);
