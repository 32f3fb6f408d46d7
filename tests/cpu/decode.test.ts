import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { decode, instructionLength } from '@core/cpu/decode';
import { Op } from '@core/cpu/opcodes';

describe('opcode decoding', () => {
  it('LDI: two operands, core unit, selector 2', () => {
    expect(decode(Op.LDI)).toEqual({ opcode: 0x82, operandCount: 2, isAlu: false, setsPc: false, selector: 2 });
  });

  it('ALU and flow bits', () => {
    const add = decode(Op.ADD);
    expect(add.isAlu).toBe(true);
    expect(add.setsPc).toBe(false);
    expect(add.selector).toBe(0);

    const jeq = decode(Op.JEQ);
    expect(jeq.setsPc).toBe(true);
    expect(jeq.isAlu).toBe(false);
    expect(jeq.operandCount).toBe(1);
    expect(jeq.selector).toBe(5);

    const ret = decode(Op.RET);
    expect(ret.operandCount).toBe(0);
    expect(ret.setsPc).toBe(true);
    expect(ret.selector).toBe(1);
  });

  it('bit 3 does not take part in the selector', () => {
    expect(decode(0b00001001).selector).toBe(1);
  });

  it('instruction length is 1 + operand count', () => {
    expect(instructionLength(decode(Op.HLT))).toBe(1);
    expect(instructionLength(decode(Op.PRN))).toBe(2);
    expect(instructionLength(decode(Op.CMP))).toBe(3);
  });

  it('every byte decodes to fields at their fixed bit positions', () => {
    fc.assert(fc.property(fc.integer({ min: 0, max: 255 }), (op) => {
      const d = decode(op);
      expect(d.opcode).toBe(op);
      expect(d.operandCount).toBe(op >> 6);
      expect(d.isAlu).toBe(((op >> 5) & 1) === 1);
      expect(d.setsPc).toBe(((op >> 4) & 1) === 1);
      expect(d.selector).toBe(op & 7);
    }));
  });
});
