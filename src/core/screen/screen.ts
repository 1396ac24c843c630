import type { Byte } from '@core/cpu/types';

export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

// 64x32 monochrome framebuffer, row-major, origin top-left
export class Screen {
  private raw = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);

  clear(): void {
    this.raw.fill(0);
  }

  /**
   * XOR a sprite onto the screen, one byte per row with the MSB leftmost.
   * The start position wraps; rows and columns running off an edge are clipped.
   * @returns true if any pixel was turned off (collision)
   */
  drawSprite(sprite: ArrayLike<Byte>, x: number, y: number): boolean {
    const x0 = x % SCREEN_WIDTH;
    const y0 = y % SCREEN_HEIGHT;
    let erased = false;
    for (let row = 0; row < sprite.length; row++) {
      const py = y0 + row;
      if (py >= SCREEN_HEIGHT) break;
      const bits = sprite[row] & 0xFF;
      for (let col = 0; col < 8; col++) {
        const px = x0 + col;
        if (px >= SCREEN_WIDTH) break;
        if ((bits & (0x80 >>> col)) === 0) continue;
        const pos = py * SCREEN_WIDTH + px;
        if (this.raw[pos]) erased = true;
        this.raw[pos] ^= 1;
      }
    }
    return erased;
  }

  // No wraparound; callers iterate the fixed 64x32 space
  pixel(x: number, y: number): boolean {
    return this.raw[y * SCREEN_WIDTH + x] !== 0;
  }

  clone(): Screen {
    const copy = new Screen();
    copy.raw.set(this.raw);
    return copy;
  }
}
