import fs from 'node:fs';
import { MEMORY_SIZE } from '@core/cpu/types';
import { ProgramLoadError } from '@core/errors/errors';

/**
 * Parse an LS-8 program image. Each meaningful line starts with eight binary
 * digits forming one byte; anything after a `#` is a comment, and blank or
 * comment-only lines are skipped.
 *
 *     10000010 # LDI R0,8
 *     00000000
 *     00001000
 */
export function parseProgramImage(text: string, capacity = MEMORY_SIZE): Uint8Array {
  const out: number[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const hash = lines[i].indexOf('#');
    const body = (hash >= 0 ? lines[i].slice(0, hash) : lines[i]).trim();
    if (body.length === 0) continue;
    const bits = body.slice(0, 8);
    if (!/^[01]{8}$/.test(bits)) {
      throw new ProgramLoadError(`expected 8 binary digits, got "${body}"`, i + 1);
    }
    if (out.length >= capacity) {
      throw new ProgramLoadError(`program does not fit in ${capacity} bytes of memory`, i + 1);
    }
    out.push(parseInt(bits, 2));
  }
  return Uint8Array.from(out);
}

export function loadProgramFile(file: string, capacity = MEMORY_SIZE): Uint8Array {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (e) {
    throw new ProgramLoadError(`cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseProgramImage(text, capacity);
}
