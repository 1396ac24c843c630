export type Rgb = [number, number, number];

export class HexColorError extends Error {
  constructor(readonly input: string) {
    super(`Hexadecimal RGB color '${input}' is not in #RRGGBB format`);
    this.name = 'HexColorError';
  }
}

// '#RRGGBB' -> [r, g, b]
export function hexToRgb(color: string): Rgb {
  const m = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(color);
  if (!m) throw new HexColorError(color);
  return [parseInt(m[1], 16), parseInt(m[2], 16), parseInt(m[3], 16)];
}
