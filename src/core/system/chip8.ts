import type { Byte, Word, Chip8State } from '@core/cpu/types';
import { Instruction } from '@core/cpu/instruction';
import { decode, type Op } from '@core/cpu/decode';
import { Screen } from '@core/screen/screen';
import { Keys } from '@core/input/keys';
import { RomTooBigError, NoMoreInstructionsError, UnknownInstructionError, type CycleError } from './errors';
import FONT_SPRITES from './font.json';

export const RAM_SIZE = 0x1000;
export const ROM_START = 0x200;
export const MAX_ROM_SIZE = RAM_SIZE - ROM_START;
const FONT_SPRITE_BYTES = 5;
const VF = 0xF;

export type CycleResult =
  | { ok: true; screen: Screen | null; beep: boolean }
  | { ok: false; error: CycleError };

export interface Chip8Options {
  // Monotonic time source in milliseconds
  clock?: () => number;
  // Byte source for Cxnn
  random?: () => Byte;
  // Timer decrement rate
  timerHz?: number;
}

const defaultRandom = (): Byte => Math.floor(Math.random() * 256) & 0xFF;

export class Chip8 {
  state: Chip8State;
  readonly ram = new Uint8Array(RAM_SIZE);
  private screen = new Screen();
  private keys = new Keys();
  private readonly clock: () => number;
  private readonly random: () => Byte;
  private readonly timerIntervalMs: number;
  private lastDecrement: number;
  // optional external per-instruction trace hook
  private traceHook: ((pc: Word, instruction: Instruction) => void) | null = null;

  constructor(rom: Uint8Array, opts: Chip8Options = {}) {
    if (rom.length > MAX_ROM_SIZE) throw new RomTooBigError(rom.length - MAX_ROM_SIZE);
    this.ram.set(FONT_SPRITES, 0);
    this.ram.set(rom, ROM_START);
    this.state = { v: new Uint8Array(16), i: 0, pc: ROM_START, dt: 0, st: 0, stack: [] };
    this.clock = opts.clock ?? (() => performance.now());
    this.random = opts.random ?? defaultRandom;
    this.timerIntervalMs = 1000 / (opts.timerHz ?? 60);
    this.lastDecrement = this.clock();
  }

  setTraceHook(fn: ((pc: Word, instruction: Instruction) => void) | null) { this.traceHook = fn; }

  /**
   * Runs one fetch-decode-execute step with the given key snapshot.
   * Returns a copy of the screen when the instruction redrew it, and whether the sound timer is running.
   * Running off the end of RAM and unknown opcodes come back as errors rather than being thrown.
   */
  instructionCycle(keys: Keys): CycleResult {
    this.decrementTimers();
    const pc = this.state.pc;
    if (pc + 1 >= RAM_SIZE) return { ok: false, error: new NoMoreInstructionsError(pc) };
    const instruction = new Instruction((this.ram[pc] << 8) | this.ram[pc + 1]);
    if (this.traceHook) this.traceHook(pc, instruction);
    this.keys = keys.clone();
    this.state.pc = (pc + 2) & 0xFFFF;

    const op = decode(instruction);
    if (op.kind === 'unknown') {
      return { ok: false, error: new UnknownInstructionError(instruction, this.state.pc) };
    }
    const redrew = this.execute(op);
    return { ok: true, screen: redrew ? this.screen.clone() : null, beep: this.state.st > 0 };
  }

  // Both timers drop by one per elapsed interval, however many cycles ran in between
  private decrementTimers() {
    const now = this.clock();
    if (now - this.lastDecrement < this.timerIntervalMs) return;
    const s = this.state;
    if (s.dt > 0) s.dt--;
    if (s.st > 0) s.st--;
    this.lastDecrement = now;
  }

  private read(addr: number): Byte { return this.ram[addr & (RAM_SIZE - 1)]; }
  private write(addr: number, value: Byte) { this.ram[addr & (RAM_SIZE - 1)] = value & 0xFF; }

  private skipIf(cond: boolean) {
    if (cond) this.state.pc = (this.state.pc + 2) & 0xFFFF;
  }

  // Returns true when the screen changed
  private execute(op: Exclude<Op, { kind: 'unknown' }>): boolean {
    const s = this.state;
    const v = s.v;
    switch (op.kind) {
      case 'nop':
        return false;
      case 'cls':
        this.screen.clear();
        return true;
      case 'ret': {
        const ret = s.stack.pop();
        if (ret === undefined) throw new Error(`Stack underflow on return at pc=0x${(s.pc - 2).toString(16)}`);
        s.pc = ret;
        return false;
      }
      case 'jp':
        s.pc = op.addr;
        return false;
      case 'call':
        s.stack.push(s.pc);
        s.pc = op.addr;
        return false;
      case 'se-byte':
        this.skipIf(v[op.x] === op.nn);
        return false;
      case 'sne-byte':
        this.skipIf(v[op.x] !== op.nn);
        return false;
      case 'se-reg':
        this.skipIf(v[op.x] === v[op.y]);
        return false;
      case 'sne-reg':
        this.skipIf(v[op.x] !== v[op.y]);
        return false;
      case 'ld-byte':
        v[op.x] = op.nn;
        return false;
      case 'add-byte':
        v[op.x] = (v[op.x] + op.nn) & 0xFF; // no flag
        return false;
      case 'ld-reg':
        v[op.x] = v[op.y];
        return false;
      // Logic ops clear VF
      case 'or':
        v[op.x] |= v[op.y];
        v[VF] = 0;
        return false;
      case 'and':
        v[op.x] &= v[op.y];
        v[VF] = 0;
        return false;
      case 'xor':
        v[op.x] ^= v[op.y];
        v[VF] = 0;
        return false;
      // Arithmetic and shifts write VF last, so VF as a destination ends up holding the flag
      case 'add-reg': {
        const sum = v[op.x] + v[op.y];
        v[op.x] = sum & 0xFF;
        v[VF] = sum > 0xFF ? 1 : 0;
        return false;
      }
      case 'sub': {
        const noBorrow = v[op.x] >= v[op.y] ? 1 : 0;
        v[op.x] = (v[op.x] - v[op.y]) & 0xFF;
        v[VF] = noBorrow;
        return false;
      }
      case 'subn': {
        const noBorrow = v[op.y] >= v[op.x] ? 1 : 0;
        v[op.x] = (v[op.y] - v[op.x]) & 0xFF;
        v[VF] = noBorrow;
        return false;
      }
      case 'shr': {
        const lsb = v[op.x] & 1;
        v[op.x] = v[op.y] >>> 1;
        v[VF] = lsb;
        return false;
      }
      case 'shl': {
        const msb = (v[op.x] >>> 7) & 1;
        v[op.x] = (v[op.y] << 1) & 0xFF;
        v[VF] = msb;
        return false;
      }
      case 'ld-i':
        s.i = op.addr;
        return false;
      case 'jp-v0':
        s.pc = (op.addr + v[0]) & 0xFFFF;
        return false;
      case 'rnd':
        v[op.x] = this.random() & op.nn;
        return false;
      case 'drw': {
        const sprite = new Uint8Array(op.n);
        for (let k = 0; k < op.n; k++) sprite[k] = this.read(s.i + k);
        v[VF] = this.screen.drawSprite(sprite, v[op.x], v[op.y]) ? 1 : 0;
        return true;
      }
      case 'skp':
        this.skipIf(this.keys.keyPressed(v[op.x]));
        return false;
      case 'sknp':
        this.skipIf(!this.keys.keyPressed(v[op.x]));
        return false;
      case 'ld-vx-dt':
        v[op.x] = s.dt;
        return false;
      case 'ld-vx-key': {
        // Busy-wait: re-run this instruction next cycle until a press arrives
        const key = this.keys.lastPressed();
        if (key === null) s.pc = (s.pc - 2) & 0xFFFF;
        else v[op.x] = key;
        return false;
      }
      case 'ld-dt-vx':
        s.dt = v[op.x];
        return false;
      case 'ld-st-vx':
        s.st = v[op.x];
        return false;
      case 'add-i':
        s.i = (s.i + v[op.x]) & 0xFFFF;
        return false;
      case 'ld-font':
        s.i = FONT_SPRITE_BYTES * v[op.x];
        return false;
      case 'bcd': {
        const vx = v[op.x];
        this.write(s.i, Math.floor(vx / 100) % 10);
        this.write(s.i + 1, Math.floor(vx / 10) % 10);
        this.write(s.i + 2, vx % 10);
        return false;
      }
      case 'store':
        for (let r = 0; r <= op.x; r++) this.write(s.i + r, v[r]);
        s.i = (s.i + op.x + 1) & 0xFFFF;
        return false;
      case 'load':
        for (let r = 0; r <= op.x; r++) v[r] = this.read(s.i + r);
        s.i = (s.i + op.x + 1) & 0xFFFF;
        return false;
    }
  }
}
