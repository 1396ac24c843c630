import { parseLayout, type Layout } from '@core/input/layout';
import { hexToRgb, type Rgb } from '@utils/color';
import { errorMessage } from '@core/system/errors';

export interface HostConfig {
  rom: string;
  layout: Layout;
  bg: Rgb;
  fg: Rgb;
  hz: number; // instructions per second
  keyHoldMs: number; // terminals report no key-up, so presses release after this long
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const USAGE = 'Usage: chip8 [--layout=qwerty|colemak] [--bg=#RRGGBB] [--fg=#RRGGBB] [--hz=N] [--key-hold=MS] <rom>';

const DEFAULT_HZ = 700;
const DEFAULT_KEY_HOLD_MS = 120;

type Env = Record<string, string | undefined>;

function getEnv(env: Env, name: string): string | null { const v = env[name]; return v && v.length > 0 ? v : null; }

function positiveInt(name: string, raw: string): number {
  if (!/^\d+$/.test(raw) || parseInt(raw, 10) === 0) throw new ConfigError(`--${name} expects a positive integer, got '${raw}'`);
  return parseInt(raw, 10);
}

// Flags take precedence over CHIP8_* environment variables
export function parseHostArgs(argv: string[], env: Env = {}): HostConfig {
  let rom = getEnv(env, 'CHIP8_ROM');
  let layout = getEnv(env, 'CHIP8_LAYOUT') ?? 'qwerty';
  let bg = '#000000';
  let fg = '#FFFFFF';
  let hz = getEnv(env, 'CHIP8_HZ') ?? String(DEFAULT_HZ);
  let keyHold = String(DEFAULT_KEY_HOLD_MS);
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a.startsWith('--layout=')) layout = a.slice(9);
    else if (a === '-l' || a === '--layout') {
      const next = argv[++i];
      if (next === undefined) throw new ConfigError(`${a} expects a value`);
      layout = next;
    }
    else if (a.startsWith('--bg=')) bg = a.slice(5);
    else if (a.startsWith('--fg=')) fg = a.slice(5);
    else if (a.startsWith('--hz=')) hz = a.slice(5);
    else if (a.startsWith('--key-hold=')) keyHold = a.slice(11);
    else if (a.startsWith('-')) throw new ConfigError(`Unknown option '${a}'`);
    else rom = a;
  }
  if (!rom) throw new ConfigError(`No ROM given\n${USAGE}`);
  try {
    return {
      rom,
      layout: parseLayout(layout),
      bg: hexToRgb(bg),
      fg: hexToRgb(fg),
      hz: positiveInt('hz', hz),
      keyHoldMs: positiveInt('key-hold', keyHold),
    };
  } catch (e) {
    if (e instanceof ConfigError) throw e;
    throw new ConfigError(errorMessage(e));
  }
}
