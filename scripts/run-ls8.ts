#!/usr/bin/env node
/* eslint-disable no-console */
import { LS8System } from '@core/system/system'
import { applyArgs, readOptionsFromEnv } from '@core/system/options'
import { PRINT8 } from '@core/program/demos'
import { LS8Error } from '@core/errors/errors'
import { disasmAt, formatDisasmLine } from '@utils/disasm_ls8'

function parseArgs() {
  const argv = process.argv.slice(2)
  const disasm = argv.includes('--disasm')
  const { options, rest } = applyArgs(argv.filter((a) => a !== '--disasm'), readOptionsFromEnv(process.env))
  return { options, disasm, image: rest[0] ?? null }
}

function main(): number {
  const args = parseArgs()
  const sys = new LS8System({ ...args.options, trace: false })
  try {
    if (args.image) sys.loadFile(args.image)
    else sys.load(PRINT8)
  } catch (e) {
    console.error(`[ls8] ${e instanceof Error ? e.message : String(e)}`)
    return 2
  }

  if (args.options.trace) {
    const peek = (a: number) => sys.bus.peek(a)
    sys.cpu.setTraceHook((line) => {
      if (args.disasm) console.log(`${line}  ${formatDisasmLine(sys.cpu.pc, disasmAt(peek, sys.cpu.pc))}`)
      else console.log(line)
    })
  }

  try {
    const res = sys.run()
    if (res.reason === 'cycle-limit') {
      console.error(`[ls8] stopped after ${res.cycles} cycles without HLT`)
      return 3
    }
    return 0
  } catch (e) {
    if (e instanceof LS8Error) { console.error(`[ls8] fatal: ${e.message}`); return 1 }
    throw e
  }
}

process.exitCode = main()
