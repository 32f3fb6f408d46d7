import { r, table } from './context';
import { popValue, pushValue } from './stack';

export const CORE_UNIT = table([
  [0b001, 'HLT', (ctx) => { ctx.running = false; }],
  [0b010, 'LDI', (ctx, a, b) => { ctx.reg[r(a)] = b & 0xFF; }],
  [0b101, 'PUSH', (ctx, a) => { pushValue(ctx, ctx.reg[r(a)]); }],
  [0b110, 'POP', (ctx, a) => {
    const v = popValue(ctx);
    if (v !== null) ctx.reg[r(a)] = v;
  }],
  [0b111, 'PRN', (ctx, a) => { ctx.emit(ctx.reg[r(a)]); }],
]);
