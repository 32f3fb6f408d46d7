import { MEMORY_SIZE } from '@core/cpu/types';
import type { Address, Byte } from '@core/cpu/types';
import { OutOfBoundsError } from '@core/errors/errors';

export type ReadResult = { ok: true; value: Byte } | { ok: false; error: OutOfBoundsError };
export type WriteResult = { ok: true } | { ok: false; error: OutOfBoundsError };

export interface BusDevice {
  read(addr: Address): ReadResult;
  write(addr: Address, value: Byte): WriteResult;
}

// Flat zero-initialized byte RAM; every access is range-checked, nothing wraps
export class RAM implements BusDevice {
  private mem = new Uint8Array(MEMORY_SIZE);

  get size(): number { return this.mem.length; }

  inRange(addr: Address): boolean {
    return Number.isInteger(addr) && addr >= 0 && addr < this.mem.length;
  }

  read(addr: Address): ReadResult {
    if (!this.inRange(addr)) return { ok: false, error: new OutOfBoundsError(addr, 'read') };
    return { ok: true, value: this.mem[addr] };
  }

  write(addr: Address, value: Byte): WriteResult {
    if (!this.inRange(addr)) return { ok: false, error: new OutOfBoundsError(addr, 'write') };
    this.mem[addr] = value & 0xFF;
    return { ok: true };
  }

  // Returns the byte, or null when out of range; never reports
  peek(addr: Address): Byte | null {
    return this.inRange(addr) ? this.mem[addr] : null;
  }

  load(data: Uint8Array, offset = 0): void {
    if (offset < 0 || offset + data.length > this.mem.length) {
      throw new OutOfBoundsError(offset + data.length - 1, 'write');
    }
    this.mem.set(data, offset);
  }

  clear(): void { this.mem.fill(0); }

  snapshot(): Uint8Array { return this.mem.slice(); }
}
