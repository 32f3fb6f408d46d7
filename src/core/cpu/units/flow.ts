import { OutOfBoundsError } from '@core/errors/errors';
import { instructionLength } from '../decode';
import type { DecodedInstruction } from '../types';
import { r, table } from './context';
import type { ExecContext } from './context';
import { popValue, pushValue } from './stack';

// Every handler here owns the PC, including the not-taken branch.

function fallThrough(ctx: ExecContext, d: DecodedInstruction) {
  ctx.pc = ctx.pc + instructionLength(d);
}

export const FLOW_UNIT = table([
  [0b000, 'CALL', (ctx, a, _b, d) => {
    // Read the target first: CALL R7 must jump to SP as it was before the push
    const target = ctx.reg[r(a)];
    const ret = ctx.pc + 2;
    // A return address past the end of memory cannot be stored in a byte
    if (ret >= ctx.bus.size) {
      ctx.report(new OutOfBoundsError(ret, 'write'));
      fallThrough(ctx, d);
    } else if (pushValue(ctx, ret)) ctx.pc = target;
    else fallThrough(ctx, d);
  }],
  [0b001, 'RET', (ctx, _a, _b, d) => {
    const ret = popValue(ctx);
    if (ret !== null) ctx.pc = ret;
    else fallThrough(ctx, d);
  }],
  [0b100, 'JMP', (ctx, a) => { ctx.pc = ctx.reg[r(a)]; }],
  [0b101, 'JEQ', (ctx, a, _b, d) => {
    if (ctx.flags.equal) ctx.pc = ctx.reg[r(a)];
    else fallThrough(ctx, d);
  }],
  [0b110, 'JNE', (ctx, a, _b, d) => {
    if (!ctx.flags.equal) ctx.pc = ctx.reg[r(a)];
    else fallThrough(ctx, d);
  }],
]);
