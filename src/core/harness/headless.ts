import type { Byte, Word } from '@core/cpu/types';
import type { Instruction } from '@core/cpu/instruction';
import { Chip8, type CycleResult } from '@core/system/chip8';
import { UnknownInstructionError, errorMessage } from '@core/system/errors';
import { Keys } from '@core/input/keys';
import { Screen } from '@core/screen/screen';

export interface RunResult {
  cycles: number;
  reason: 'end' | 'unknown' | 'limit' | 'fail';
  message?: string;
  screen: Screen; // last frame the program drew
  beeped: boolean; // sound timer was running on at least one cycle
}

export interface RunOptions {
  maxCycles: number;
  // 'halt' stops on an unknown opcode, 'skip' carries on with the next instruction
  onUnknown?: 'halt' | 'skip';
  // Keys held for the whole run; they count as freshly pressed on the first cycle only
  keys?: Byte[];
  clock?: () => number;
  random?: () => Byte;
  trace?: (pc: Word, instruction: Instruction) => void;
}

export function runRom(buffer: Uint8Array, opts: RunOptions): RunResult {
  let screen = new Screen();
  let beeped = false;
  let chip8: Chip8;
  try {
    chip8 = new Chip8(buffer, { clock: opts.clock, random: opts.random });
  } catch (e) {
    return { cycles: 0, reason: 'fail', message: errorMessage(e), screen, beeped };
  }
  if (opts.trace) chip8.setTraceHook(opts.trace);

  const keys = new Keys();
  for (const k of opts.keys ?? []) keys.pressKey(k);
  const onUnknown = opts.onUnknown ?? 'halt';

  let cycles = 0;
  while (cycles < opts.maxCycles) {
    let res: CycleResult;
    try {
      res = chip8.instructionCycle(keys);
    } catch (e) {
      return { cycles, reason: 'fail', message: errorMessage(e), screen, beeped };
    }
    cycles++;
    keys.resetLastPressed();
    if (!res.ok) {
      if (res.error instanceof UnknownInstructionError) {
        if (onUnknown === 'skip') continue;
        return { cycles, reason: 'unknown', message: res.error.message, screen, beeped };
      }
      return { cycles, reason: 'end', message: res.error.message, screen, beeped };
    }
    if (res.screen) screen = res.screen;
    if (res.beep) beeped = true;
  }
  return { cycles, reason: 'limit', screen, beeped };
}
