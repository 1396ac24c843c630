import { describe, it, expect } from 'vitest';
import { Screen } from '@core/screen/screen';
import { renderFrame } from '@host/node/terminal';
import type { Rgb } from '@utils/color';

const FG: Rgb = [255, 255, 255];
const BG: Rgb = [0, 0, 0];
const OFF_OFF = '\x1b[38;2;0;0;0;48;2;0;0;0m';
const ON_OFF = '\x1b[38;2;255;255;255;48;2;0;0;0m';
const OFF_ON = '\x1b[38;2;0;0;0;48;2;255;255;255m';
const RESET = '\x1b[0m';

describe('renderFrame', () => {
  it('packs two pixel rows into each line', () => {
    const lines = renderFrame(new Screen(), FG, BG);
    expect(lines).toHaveLength(16);
    expect(lines[0]).toBe(OFF_OFF + '▀'.repeat(64) + RESET);
  });

  it('colours the top pixel with the foreground of the cell', () => {
    const s = new Screen();
    s.drawSprite([0x80], 0, 0);
    expect(renderFrame(s, FG, BG)[0]).toBe(ON_OFF + '▀' + OFF_OFF + '▀'.repeat(63) + RESET);
  });

  it('colours the bottom pixel with the background of the cell', () => {
    const s = new Screen();
    s.drawSprite([0x00, 0xC0], 62, 2);
    const line = renderFrame(s, FG, BG)[1];
    expect(line).toBe(OFF_OFF + '▀'.repeat(62) + OFF_ON + '▀▀' + RESET);
  });
});
