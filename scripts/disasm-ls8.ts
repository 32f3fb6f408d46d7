#!/usr/bin/env node
/* eslint-disable no-console */
import { loadProgramFile } from '@core/program/image'
import { disassemble } from '@utils/disasm_ls8'

const file = process.argv[2]
if (!file) { console.error('usage: disasm-ls8 <image.ls8>'); process.exit(2) }
try {
  for (const line of disassemble(loadProgramFile(file))) console.log(line)
} catch (e) {
  console.error(`[ls8] ${e instanceof Error ? e.message : String(e)}`)
  process.exit(2)
}
