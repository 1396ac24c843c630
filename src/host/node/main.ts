#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs';
import { Chip8 } from '@core/system/chip8';
import { errorMessage } from '@core/system/errors';
import { layoutName } from '@core/input/layout';
import { parseHostArgs } from './config';
import { TerminalDriver } from './driver';

async function main(): Promise<void> {
  const config = parseHostArgs(process.argv.slice(2), process.env);
  if (!fs.existsSync(config.rom)) throw new Error(`ROM not found: ${config.rom}`);
  const chip8 = new Chip8(new Uint8Array(fs.readFileSync(config.rom)));
  if (process.env.CHIP8_TRACE === '1') {
    chip8.setTraceHook((pc, ins) => console.error(`[trace] ${pc.toString(16).toUpperCase().padStart(4, '0')} ${ins.toString()}`));
  }
  console.log(`${config.rom} (${layoutName(config.layout)}, ${config.hz} Hz) - Esc or Ctrl-C to quit`);
  const driver = new TerminalDriver(chip8, config, { input: process.stdin, output: process.stdout });
  const result = await driver.start();
  if (result.reason === 'error') console.error(result.message);
  if (result.reason === 'unknown' || result.reason === 'error') {
    process.exitCode = 1;
  } else if (result.reason === 'end') {
    console.log(result.message);
  }
}

main().catch((e) => { console.error(errorMessage(e)); process.exitCode = 1; });
