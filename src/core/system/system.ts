import { RAM } from '@core/bus/ram';
import { LS8CPU } from '@core/cpu/cpu';
import type { RunResult } from '@core/cpu/types';
import { ProgramLoadError } from '@core/errors/errors';
import { loadProgramFile, parseProgramImage } from '@core/program/image';
import { DEFAULT_OPTIONS } from './options';
import type { MachineOptions } from './options';

// One machine instance: its own RAM, registers, flags and PC. Nothing is shared.
export class LS8System {
  public bus: RAM;
  public cpu: LS8CPU;
  readonly options: MachineOptions;

  constructor(options: Partial<MachineOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.bus = new RAM();
    this.cpu = new LS8CPU(this.bus);
    if (this.options.trace) {
      // eslint-disable-next-line no-console
      this.cpu.setTraceHook((line) => console.log(line));
    }
  }

  // Image is copied to address 0. Memory is cleared first, so only a fully
  // parsed image ever reaches it.
  load(image: Uint8Array) {
    if (image.length > this.bus.size) {
      throw new ProgramLoadError(`image of ${image.length} bytes exceeds ${this.bus.size} bytes of memory`);
    }
    this.bus.clear();
    this.bus.load(image, 0);
  }

  loadText(text: string) { this.load(parseProgramImage(text, this.bus.size)); }
  loadFile(file: string) { this.load(loadProgramFile(file, this.bus.size)); }

  reset() { this.cpu.reset(); }

  run(): RunResult {
    return this.cpu.run({ maxCycles: this.options.maxCycles });
  }
}
