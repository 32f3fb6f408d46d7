import { r, table } from './context';

// Registers are Uint8Array cells, so stores wrap modulo 256
export const ALU_UNIT = table([
  [0b000, 'ADD', (ctx, a, b) => { ctx.reg[r(a)] = (ctx.reg[r(a)] + ctx.reg[r(b)]) & 0xFF; }],
  [0b010, 'MUL', (ctx, a, b) => { ctx.reg[r(a)] = (ctx.reg[r(a)] * ctx.reg[r(b)]) & 0xFF; }],
  [0b111, 'CMP', (ctx, a, b) => { ctx.flags.setFromComparison(ctx.reg[r(a)], ctx.reg[r(b)]); }],
]);
