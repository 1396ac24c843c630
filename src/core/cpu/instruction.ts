import type { Byte, Word } from './types';

export type Nibbles = [number, number, number, number];

// A raw 16-bit opcode with its fields decoded on demand
export class Instruction {
  readonly raw: Word;

  constructor(raw: Word) {
    this.raw = raw & 0xFFFF;
  }

  nibbles(): Nibbles {
    return [
      (this.raw >>> 12) & 0xF,
      (this.raw >>> 8) & 0xF,
      (this.raw >>> 4) & 0xF,
      this.raw & 0xF,
    ];
  }

  // Register selector in bits 8..11
  x(): number { return (this.raw >>> 8) & 0xF; }
  // Register selector in bits 4..7
  y(): number { return (this.raw >>> 4) & 0xF; }
  n(): number { return this.raw & 0xF; }
  nn(): Byte { return this.raw & 0xFF; }
  nnn(): Word { return this.raw & 0x0FFF; }

  toString(): string {
    return this.raw.toString(16).toUpperCase().padStart(4, '0');
  }
}
