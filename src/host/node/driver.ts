import type { Byte } from '@core/cpu/types';
import type { Chip8 } from '@core/system/chip8';
import { NoMoreInstructionsError, errorMessage } from '@core/system/errors';
import { Keys } from '@core/input/keys';
import { keyForCharacter } from '@core/input/layout';
import type { HostConfig } from './config';
import { renderFrame, ENTER, HOME, LEAVE, BELL } from './terminal';

const FRAME_HZ = 60;
const CTRL_C = '\x03';
const ESC = '\x1b';

export interface TerminalInput {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  setRawMode?(mode: boolean): unknown;
  isTTY?: boolean;
  resume?(): unknown;
  pause?(): unknown;
}

export interface TerminalOutput {
  write(s: string): unknown;
}

export interface TerminalIO {
  input: TerminalInput;
  output: TerminalOutput;
}

export interface StopResult {
  reason: 'quit' | 'end' | 'unknown' | 'error';
  message?: string;
}

// Drives a Chip8 from a raw-mode terminal: keys in, half-block frames and the bell out
export class TerminalDriver {
  private keys = new Keys();
  private releaseAt = new Map<Byte, number>();
  private beeping = false;
  private carry = 0; // fractional cycles owed to the next frame
  private timer: ReturnType<typeof setInterval> | null = null;
  private done: ((r: StopResult) => void) | null = null;
  private running = false;

  constructor(
    private chip8: Chip8,
    private config: HostConfig,
    private io: TerminalIO,
    private now: () => number = () => performance.now(),
  ) {}

  start(): Promise<StopResult> {
    const { input, output } = this.io;
    if (input.isTTY && input.setRawMode) input.setRawMode(true);
    input.on('data', this.onData);
    input.resume?.();
    output.write(ENTER);
    this.running = true;
    this.timer = setInterval(() => this.tick(), 1000 / FRAME_HZ);
    return new Promise<StopResult>((resolve) => { this.done = resolve; });
  }

  isRunning(): boolean { return this.running; }

  heldKeys(): number { return this.keys.read(); }

  onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    // A lone ESC is the Escape key; longer sequences starting with ESC are arrows etc.
    if (text.includes(CTRL_C) || text === ESC) {
      this.stop({ reason: 'quit' });
      return;
    }
    for (const ch of text) {
      const key = keyForCharacter(this.config.layout, ch);
      if (key !== null) this.press(key);
    }
  };

  // Terminals deliver no key-up events; a press holds the key for keyHoldMs (auto-repeat extends it)
  private press(key: Byte) {
    this.keys.pressKey(key);
    this.releaseAt.set(key, this.now() + this.config.keyHoldMs);
  }

  private releaseExpired() {
    const t = this.now();
    for (const [key, at] of this.releaseAt) {
      if (t >= at) {
        this.keys.releaseKey(key);
        this.releaseAt.delete(key);
      }
    }
  }

  // One 60 Hz frame worth of instruction cycles
  tick(): void {
    this.releaseExpired();
    const budget = this.config.hz / FRAME_HZ + this.carry;
    const n = Math.floor(budget);
    this.carry = budget - n;
    for (let i = 0; i < n && this.running; i++) {
      try {
        this.step();
      } catch (e) {
        this.stop({ reason: 'error', message: errorMessage(e) });
      }
    }
  }

  private step() {
    const res = this.chip8.instructionCycle(this.keys);
    this.keys.resetLastPressed();
    if (!res.ok) {
      if (res.error instanceof NoMoreInstructionsError) {
        this.stop({ reason: 'end', message: res.error.message });
      } else {
        // eslint-disable-next-line no-console
        console.error(`[chip8] ${res.error.message}`);
        this.stop({ reason: 'unknown', message: res.error.message });
      }
      return;
    }
    if (res.screen) {
      this.io.output.write(HOME + renderFrame(res.screen, this.config.fg, this.config.bg).join('\n'));
    }
    if (res.beep && !this.beeping) this.io.output.write(BELL);
    this.beeping = res.beep;
  }

  stop(result: StopResult): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) { clearInterval(this.timer); this.timer = null; }
    const { input, output } = this.io;
    input.off('data', this.onData);
    if (input.isTTY && input.setRawMode) input.setRawMode(false);
    input.pause?.();
    output.write(LEAVE);
    const done = this.done;
    this.done = null;
    if (done) done(result);
  }
}
