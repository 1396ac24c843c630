import { Chip8, type Chip8Options, type CycleResult } from '@core/system/chip8';
import { Keys } from '@core/input/keys';

// Big-endian opcode words -> ROM bytes
export function romFromOpcodes(ops: number[]): Uint8Array {
  const rom = new Uint8Array(ops.length * 2);
  ops.forEach((op, i) => {
    rom[i * 2] = (op >>> 8) & 0xFF;
    rom[i * 2 + 1] = op & 0xFF;
  });
  return rom;
}

// Engine loaded with a program at 0x200 and a manual clock (ms) that only moves when a test moves it
export function chip8WithProgram(ops: number[], opts: Chip8Options = {}) {
  const clock = { now: 0 };
  const chip8 = new Chip8(romFromOpcodes(ops), { clock: () => clock.now, ...opts });
  return { chip8, clock };
}

// Run n cycles, throwing the first cycle error
export function steps(chip8: Chip8, n: number, keys = new Keys()): CycleResult {
  let res: CycleResult = { ok: true, screen: null, beep: false };
  for (let i = 0; i < n; i++) {
    res = chip8.instructionCycle(keys);
    if (!res.ok) throw res.error;
  }
  return res;
}
