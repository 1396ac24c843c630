import type { Byte } from '@core/cpu/types';

export type Layout = 'qwerty' | 'colemak';

export class ParseLayoutError extends Error {
  constructor(readonly input: string) {
    super(`Keyboard layout '${input}' is unknown (QWERTY and Colemak supported)`);
    this.name = 'ParseLayoutError';
  }
}

// Keypad order, row by row:  1 2 3 C / 4 5 6 D / 7 8 9 E / A 0 B F
const KEYPAD: Byte[] = [0x1, 0x2, 0x3, 0xC, 0x4, 0x5, 0x6, 0xD, 0x7, 0x8, 0x9, 0xE, 0xA, 0x0, 0xB, 0xF];

// The 4x4 block on the left of each layout, row-major in the same order as KEYPAD
const BLOCKS: Record<Layout, string> = {
  qwerty: '1234qwerasdfzxcv',
  colemak: '1234qwfparstzxcv',
};

const buildMap = (block: string): Map<string, Byte> => {
  const m = new Map<string, Byte>();
  block.split('').forEach((ch, i) => m.set(ch, KEYPAD[i]));
  return m;
};

const MAPS: Record<Layout, Map<string, Byte>> = {
  qwerty: buildMap(BLOCKS.qwerty),
  colemak: buildMap(BLOCKS.colemak),
};

export function parseLayout(text: string): Layout {
  const v = text.trim().toLowerCase();
  if (v === 'qwerty' || v === 'colemak') return v;
  throw new ParseLayoutError(text);
}

export function layoutName(layout: Layout): string {
  return layout === 'qwerty' ? 'QWERTY' : 'Colemak';
}

// Map a typed character onto a keypad key; null when the character is not part of the block
export function keyForCharacter(layout: Layout, ch: string): Byte | null {
  return MAPS[layout].get(ch.toLowerCase()) ?? null;
}
