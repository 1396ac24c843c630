import type { Byte } from '@core/cpu/types';

// Snapshot of the 16-key hex keypad (0x0..0xF)
export class Keys {
  private raw = 0; // bit k set while key k is held
  private last: Byte | null = null;

  /** Marks a key as held and remembers it as the most recent press. */
  pressKey(key: Byte): void {
    this.raw |= 1 << (key & 0xF);
    this.last = key & 0xF;
  }

  /** Releases a key. The last-pressed slot is left alone so a quick tap is still observed. */
  releaseKey(key: Byte): void {
    this.raw &= ~(1 << (key & 0xF)) & 0xFFFF;
  }

  keyPressed(key: Byte): boolean {
    return (this.raw & (1 << (key & 0xF))) !== 0;
  }

  lastPressed(): Byte | null {
    return this.last;
  }

  /** Drivers call this once per instruction cycle, after the cycle ran. */
  resetLastPressed(): void {
    this.last = null;
  }

  // 16-bit mask of held keys
  read(): number {
    return this.raw;
  }

  clone(): Keys {
    const copy = new Keys();
    copy.raw = this.raw;
    copy.last = this.last;
    return copy;
  }
}
