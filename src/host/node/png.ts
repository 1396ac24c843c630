import fs from 'node:fs';
import path from 'node:path';
import { PNG } from 'pngjs';
import { type Screen, SCREEN_WIDTH, SCREEN_HEIGHT } from '@core/screen/screen';
import type { Rgb } from '@utils/color';

export interface PngOptions {
  fg: Rgb;
  bg: Rgb;
  scale?: number;
}

export function screenToPng(screen: Screen, opts: PngOptions): PNG {
  const scale = opts.scale ?? 1;
  const W = SCREEN_WIDTH * scale, H = SCREEN_HEIGHT * scale;
  const png = new PNG({ width: W, height: H });
  for (let y = 0; y < SCREEN_HEIGHT; y++) {
    for (let x = 0; x < SCREEN_WIDTH; x++) {
      const [r, g, b] = screen.pixel(x, y) ? opts.fg : opts.bg;
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = ((oy + (x * scale + dx)) << 2);
          png.data[o + 0] = r;
          png.data[o + 1] = g;
          png.data[o + 2] = b;
          png.data[o + 3] = 255;
        }
      }
    }
  }
  return png;
}

export const writePng = async (outPath: string, png: PNG): Promise<void> => {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  const stream = fs.createWriteStream(outPath);
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve());
    stream.on('error', (e) => reject(e));
    png.pack().pipe(stream);
  });
};
