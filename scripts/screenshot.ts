/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { runRom } from '@core/harness/headless'
import { hexToRgb } from '@utils/color'
import { screenToPng, writePng } from '@host/node/png'

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function parseArgs() {
  let rom = getEnv('CHIP8_ROM') || ''
  let out = getEnv('SCREENSHOT_OUT') || ''
  let cycles = parseInt(getEnv('SCREENSHOT_CYCLES') || '2000', 10)
  let scale = 8
  let fg = '#FFFFFF'
  let bg = '#000000'
  for (const a of process.argv.slice(2)) {
    if (a.startsWith('--out=')) out = a.slice(6)
    else if (a.startsWith('--cycles=')) cycles = parseInt(a.slice(9), 10)
    else if (a.startsWith('--scale=')) scale = parseInt(a.slice(8), 10)
    else if (a.startsWith('--fg=')) fg = a.slice(5)
    else if (a.startsWith('--bg=')) bg = a.slice(5)
    else rom = a
  }
  if (!out && rom) out = path.resolve('screenshots', `${path.basename(rom, path.extname(rom))}.png`)
  return { rom, out, cycles, scale, fg: hexToRgb(fg), bg: hexToRgb(bg) }
}

async function main(): Promise<void> {
  const args = parseArgs()
  if (!args.rom) { console.error('Usage: tsx scripts/screenshot.ts [--cycles=N] [--scale=N] [--out=file.png] <rom>'); process.exit(2) }
  if (!fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom}`); process.exit(2) }
  if (!Number.isFinite(args.cycles) || args.cycles <= 0 || !Number.isFinite(args.scale) || args.scale <= 0) {
    console.error('--cycles and --scale expect positive integers'); process.exit(2)
  }
  const res = runRom(new Uint8Array(fs.readFileSync(args.rom)), { maxCycles: args.cycles, onUnknown: 'skip' })
  if (res.reason === 'fail') { console.error(res.message); process.exit(1) }
  await writePng(args.out, screenToPng(res.screen, { fg: args.fg, bg: args.bg, scale: args.scale }))
  console.log(JSON.stringify({ rom: args.rom, out: args.out, cycles: res.cycles, reason: res.reason, beeped: res.beeped }))
}

main().catch((e) => { console.error(e); process.exit(1) })
