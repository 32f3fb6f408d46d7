import { StackError } from '@core/errors/errors';
import { SP } from '../types';
import type { Byte } from '../types';
import type { ExecContext } from './context';

// Decrement SP, then store. False (and nothing changed) when SP is already 0.
export function pushValue(ctx: ExecContext, value: Byte): boolean {
  const sp = ctx.reg[SP];
  if (sp === 0) {
    ctx.report(new StackError('push', sp));
    return false;
  }
  const res = ctx.bus.write(sp - 1, value);
  if (!res.ok) {
    ctx.report(res.error);
    return false;
  }
  ctx.reg[SP] = sp - 1;
  return true;
}

// Load from SP, then increment. The slot is not cleared, so popping an empty
// stack yields whatever was last stored there. Null when SP+1 would leave memory.
export function popValue(ctx: ExecContext): Byte | null {
  const sp = ctx.reg[SP];
  if (sp + 1 >= ctx.bus.size) {
    ctx.report(new StackError('pop', sp));
    return null;
  }
  const res = ctx.bus.read(sp);
  if (!res.ok) {
    ctx.report(res.error);
    return null;
  }
  ctx.reg[SP] = sp + 1;
  return res.value;
}
