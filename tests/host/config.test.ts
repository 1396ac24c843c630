import { describe, it, expect } from 'vitest';
import { parseHostArgs, ConfigError } from '@host/node/config';

describe('parseHostArgs', () => {
  it('applies defaults around a ROM path', () => {
    expect(parseHostArgs(['games/pong.ch8'])).toEqual({
      rom: 'games/pong.ch8',
      layout: 'qwerty',
      bg: [0, 0, 0],
      fg: [255, 255, 255],
      hz: 700,
      keyHoldMs: 120,
    });
  });

  it('reads every flag', () => {
    const cfg = parseHostArgs(['--layout=Colemak', '--bg=#102030', '--fg=#FFFF00', '--hz=500', '--key-hold=200', 'pong.ch8']);
    expect(cfg).toEqual({ rom: 'pong.ch8', layout: 'colemak', bg: [0x10, 0x20, 0x30], fg: [255, 255, 0], hz: 500, keyHoldMs: 200 });
  });

  it('accepts -l with a separate value', () => {
    expect(parseHostArgs(['-l', 'colemak', 'a.ch8']).layout).toBe('colemak');
  });

  it('falls back to the environment, with flags taking precedence', () => {
    const env = { CHIP8_ROM: 'env.ch8', CHIP8_HZ: '1000', CHIP8_LAYOUT: 'colemak' };
    expect(parseHostArgs([], env)).toMatchObject({ rom: 'env.ch8', hz: 1000, layout: 'colemak' });
    expect(parseHostArgs(['--hz=300', 'arg.ch8'], env)).toMatchObject({ rom: 'arg.ch8', hz: 300 });
  });

  it('rejects bad input with a ConfigError', () => {
    expect(() => parseHostArgs([])).toThrow(ConfigError);
    expect(() => parseHostArgs([])).toThrow(/^No ROM given/);
    expect(() => parseHostArgs(['--hz=0', 'x.ch8'])).toThrow("--hz expects a positive integer, got '0'");
    expect(() => parseHostArgs(['--key-hold=fast', 'x.ch8'])).toThrow("--key-hold expects a positive integer, got 'fast'");
    expect(() => parseHostArgs(['--layout=dvorak', 'x.ch8'])).toThrow(ConfigError);
    expect(() => parseHostArgs(['--bg=red', 'x.ch8'])).toThrow("Hexadecimal RGB color 'red' is not in #RRGGBB format");
    expect(() => parseHostArgs(['--bogus', 'x.ch8'])).toThrow("Unknown option '--bogus'");
    expect(() => parseHostArgs(['-l'])).toThrow('-l expects a value');
  });
});
