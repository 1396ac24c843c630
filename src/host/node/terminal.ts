import { type Screen, SCREEN_WIDTH, SCREEN_HEIGHT } from '@core/screen/screen';
import type { Rgb } from '@utils/color';

export const ENTER = '\x1b[?25l\x1b[2J'; // hide cursor, clear
export const HOME = '\x1b[H';
export const LEAVE = '\x1b[0m\x1b[?25h\n';
export const BELL = '\x07';
const RESET = '\x1b[0m';
const HALF_BLOCK = '▀'; // upper half block: top pixel in fg colour, bottom pixel in bg colour

const sgr = (top: Rgb, bottom: Rgb): string => `\x1b[38;2;${top.join(';')};48;2;${bottom.join(';')}m`;

/**
 * Render the framebuffer as SCREEN_HEIGHT / 2 lines of half-block cells,
 * two pixel rows per terminal line. Colour escapes are only emitted when a cell differs from its left neighbour.
 */
export function renderFrame(screen: Screen, fg: Rgb, bg: Rgb): string[] {
  const lines: string[] = [];
  for (let y = 0; y < SCREEN_HEIGHT; y += 2) {
    let line = '';
    let prev = -1;
    for (let x = 0; x < SCREEN_WIDTH; x++) {
      const top = screen.pixel(x, y);
      const bottom = screen.pixel(x, y + 1);
      const cell = (top ? 2 : 0) | (bottom ? 1 : 0);
      if (cell !== prev) {
        line += sgr(top ? fg : bg, bottom ? fg : bg);
        prev = cell;
      }
      line += HALF_BLOCK;
    }
    lines.push(line + RESET);
  }
  return lines;
}
