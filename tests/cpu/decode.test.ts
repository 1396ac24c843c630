import { describe, it, expect } from 'vitest';
import { Instruction } from '@core/cpu/instruction';
import { decode, type OpKind } from '@core/cpu/decode';

const kind = (raw: number): OpKind => decode(new Instruction(raw)).kind;

describe('decode', () => {
  it('maps every opcode pattern onto its operation', () => {
    const table: [number, OpKind][] = [
      [0x0000, 'nop'], [0x00E0, 'cls'], [0x00EE, 'ret'],
      [0x1ABC, 'jp'], [0x2ABC, 'call'], [0x3A12, 'se-byte'], [0x4A12, 'sne-byte'],
      [0x5AB0, 'se-reg'], [0x6A12, 'ld-byte'], [0x7A12, 'add-byte'],
      [0x8AB0, 'ld-reg'], [0x8AB1, 'or'], [0x8AB2, 'and'], [0x8AB3, 'xor'], [0x8AB4, 'add-reg'],
      [0x8AB5, 'sub'], [0x8AB6, 'shr'], [0x8AB7, 'subn'], [0x8ABE, 'shl'],
      [0x9AB0, 'sne-reg'], [0xAABC, 'ld-i'], [0xBABC, 'jp-v0'], [0xCA12, 'rnd'], [0xDAB5, 'drw'],
      [0xEA9E, 'skp'], [0xEAA1, 'sknp'],
      [0xFA07, 'ld-vx-dt'], [0xFA0A, 'ld-vx-key'], [0xFA15, 'ld-dt-vx'], [0xFA18, 'ld-st-vx'],
      [0xFA1E, 'add-i'], [0xFA29, 'ld-font'], [0xFA33, 'bcd'], [0xFA55, 'store'], [0xFA65, 'load'],
    ];
    expect(new Set(table.map(([, k]) => k)).size).toBe(35);
    for (const [raw, k] of table) expect([raw, kind(raw)]).toEqual([raw, k]);
  });

  it('carries operands on the decoded operation', () => {
    expect(decode(new Instruction(0xD125))).toEqual({ kind: 'drw', x: 1, y: 2, n: 5 });
    expect(decode(new Instruction(0x7A12))).toEqual({ kind: 'add-byte', x: 0xA, nn: 0x12 });
    expect(decode(new Instruction(0x2345))).toEqual({ kind: 'call', addr: 0x345 });
  });

  it('reports unmatched patterns as unknown', () => {
    for (const raw of [0x0123, 0x00E1, 0x00FF, 0x5AB1, 0x8AB8, 0x8ABF, 0x9AB1, 0xEA9F, 0xE0A2, 0xF0FF, 0xF000]) {
      expect([raw, kind(raw)]).toEqual([raw, 'unknown']);
    }
  });
});
