#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import { runRom } from '@core/harness/headless'

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function hex(v: number, w: number) { return v.toString(16).toUpperCase().padStart(w, '0') }

function parseArgs() {
  let rom = getEnv('CHIP8_ROM') || ''
  let max = parseInt(getEnv('TRACE_MAX') || '1000', 10)
  let keys: number[] = []
  for (const a of process.argv.slice(2)) {
    if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a.startsWith('--keys=')) keys = a.slice(7).split('').map((c) => parseInt(c, 16)).filter((k) => Number.isFinite(k))
    else rom = a
  }
  return { rom, max, keys }
}

function main() {
  const args = parseArgs()
  if (!args.rom || !fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom || '(none)'}`); process.exit(2) }
  const res = runRom(new Uint8Array(fs.readFileSync(args.rom)), {
    maxCycles: args.max > 0 ? args.max : Number.MAX_SAFE_INTEGER,
    keys: args.keys,
    trace: (pc, ins) => console.log(`${hex(pc, 4)}  ${ins.toString()}`),
  })
  console.log(`-- ${res.reason} after ${res.cycles} cycles${res.message ? `: ${res.message}` : ''}`)
  if (res.reason === 'fail' || res.reason === 'unknown') process.exitCode = 1
}

main()
