import { describe, it, expect } from 'vitest';
import { SCREEN_WIDTH, SCREEN_HEIGHT, type Screen } from '@core/screen/screen';
import { chip8WithProgram, steps } from '../helpers/chip8h';

const blank = (s: Screen): boolean => {
  for (let y = 0; y < SCREEN_HEIGHT; y++) for (let x = 0; x < SCREEN_WIDTH; x++) if (s.pixel(x, y)) return false;
  return true;
};

describe('Chip8: drawing', () => {
  it('Dxyn draws the sprite at (Vx, Vy) and returns a frame', () => {
    const { chip8 } = chip8WithProgram([0x6005, 0x6103, 0xA000, 0xD015]);
    const res = steps(chip8, 4);
    if (!res.ok || !res.screen) throw new Error('expected a frame');
    const s = res.screen;
    // "0" glyph: F0 90 90 90 F0
    expect([5, 6, 7, 8, 9].map((x) => s.pixel(x, 3))).toEqual([true, true, true, true, false]);
    expect([5, 6, 7, 8].map((x) => s.pixel(x, 4))).toEqual([true, false, false, true]);
    expect(s.pixel(5, 7)).toBe(true);
    expect(s.pixel(5, 8)).toBe(false);
    expect(chip8.state.v[0xF]).toBe(0);
  });

  it('Dxyn sets VF when it erases a pixel', () => {
    const { chip8 } = chip8WithProgram([0xA000, 0xD005, 0xD005]);
    steps(chip8, 2);
    expect(chip8.state.v[0xF]).toBe(0);
    const res = steps(chip8, 1);
    expect(chip8.state.v[0xF]).toBe(1);
    if (!res.ok || !res.screen) throw new Error('expected a frame');
    expect(blank(res.screen)).toBe(true);
  });

  it('clips a sprite drawn across the right edge', () => {
    // I -> the 0xFF byte of the last word
    const { chip8 } = chip8WithProgram([0x603C, 0x6100, 0xA208, 0xD011, 0xFF00]);
    const res = steps(chip8, 4);
    if (!res.ok || !res.screen) throw new Error('expected a frame');
    for (let x = 60; x < 64; x++) expect(res.screen.pixel(x, 0)).toBe(true);
    for (let x = 0; x < 4; x++) expect(res.screen.pixel(x, 0)).toBe(false);
  });

  it('00E0 clears the screen and returns a frame', () => {
    const { chip8 } = chip8WithProgram([0xA000, 0xD005, 0x00E0]);
    steps(chip8, 2);
    const res = steps(chip8, 1);
    if (!res.ok || !res.screen) throw new Error('expected a frame');
    expect(blank(res.screen)).toBe(true);
  });

  it('returns no frame for instructions that do not draw', () => {
    const { chip8 } = chip8WithProgram([0x6001]);
    expect(steps(chip8, 1)).toEqual({ ok: true, screen: null, beep: false });
  });

  it('hands out a copy that later cycles do not change', () => {
    const { chip8 } = chip8WithProgram([0xA000, 0xD005, 0x00E0]);
    const res = steps(chip8, 2);
    steps(chip8, 1);
    if (!res.ok || !res.screen) throw new Error('expected a frame');
    expect(res.screen.pixel(0, 0)).toBe(true);
  });
});
