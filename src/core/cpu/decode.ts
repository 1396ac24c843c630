import type { Byte, Word } from './types';
import type { Instruction } from './instruction';

type Reg = number; // 0x0..0xF

// Closed set of CHIP-8 operations; anything else decodes to 'unknown'
export type Op =
  | { kind: 'nop' }                          // 0000
  | { kind: 'cls' }                          // 00E0
  | { kind: 'ret' }                          // 00EE
  | { kind: 'jp'; addr: Word }               // 1nnn
  | { kind: 'call'; addr: Word }             // 2nnn
  | { kind: 'se-byte'; x: Reg; nn: Byte }    // 3xnn
  | { kind: 'sne-byte'; x: Reg; nn: Byte }   // 4xnn
  | { kind: 'se-reg'; x: Reg; y: Reg }       // 5xy0
  | { kind: 'ld-byte'; x: Reg; nn: Byte }    // 6xnn
  | { kind: 'add-byte'; x: Reg; nn: Byte }   // 7xnn
  | { kind: 'ld-reg'; x: Reg; y: Reg }       // 8xy0
  | { kind: 'or'; x: Reg; y: Reg }           // 8xy1
  | { kind: 'and'; x: Reg; y: Reg }          // 8xy2
  | { kind: 'xor'; x: Reg; y: Reg }          // 8xy3
  | { kind: 'add-reg'; x: Reg; y: Reg }      // 8xy4
  | { kind: 'sub'; x: Reg; y: Reg }          // 8xy5
  | { kind: 'shr'; x: Reg; y: Reg }          // 8xy6
  | { kind: 'subn'; x: Reg; y: Reg }         // 8xy7
  | { kind: 'shl'; x: Reg; y: Reg }          // 8xyE
  | { kind: 'sne-reg'; x: Reg; y: Reg }      // 9xy0
  | { kind: 'ld-i'; addr: Word }             // Annn
  | { kind: 'jp-v0'; addr: Word }            // Bnnn
  | { kind: 'rnd'; x: Reg; nn: Byte }        // Cxnn
  | { kind: 'drw'; x: Reg; y: Reg; n: number } // Dxyn
  | { kind: 'skp'; x: Reg }                  // Ex9E
  | { kind: 'sknp'; x: Reg }                 // ExA1
  | { kind: 'ld-vx-dt'; x: Reg }             // Fx07
  | { kind: 'ld-vx-key'; x: Reg }            // Fx0A
  | { kind: 'ld-dt-vx'; x: Reg }             // Fx15
  | { kind: 'ld-st-vx'; x: Reg }             // Fx18
  | { kind: 'add-i'; x: Reg }                // Fx1E
  | { kind: 'ld-font'; x: Reg }              // Fx29
  | { kind: 'bcd'; x: Reg }                  // Fx33
  | { kind: 'store'; x: Reg }                // Fx55
  | { kind: 'load'; x: Reg }                 // Fx65
  | { kind: 'unknown' };

export type OpKind = Op['kind'];

export function decode(ins: Instruction): Op {
  const [op, x, y, n] = ins.nibbles();
  const nn = ins.nn();
  const addr = ins.nnn();
  switch (op) {
    case 0x0:
      if (ins.raw === 0x0000) return { kind: 'nop' };
      if (ins.raw === 0x00E0) return { kind: 'cls' };
      if (ins.raw === 0x00EE) return { kind: 'ret' };
      return { kind: 'unknown' };
    case 0x1: return { kind: 'jp', addr };
    case 0x2: return { kind: 'call', addr };
    case 0x3: return { kind: 'se-byte', x, nn };
    case 0x4: return { kind: 'sne-byte', x, nn };
    case 0x5: return n === 0 ? { kind: 'se-reg', x, y } : { kind: 'unknown' };
    case 0x6: return { kind: 'ld-byte', x, nn };
    case 0x7: return { kind: 'add-byte', x, nn };
    case 0x8:
      switch (n) {
        case 0x0: return { kind: 'ld-reg', x, y };
        case 0x1: return { kind: 'or', x, y };
        case 0x2: return { kind: 'and', x, y };
        case 0x3: return { kind: 'xor', x, y };
        case 0x4: return { kind: 'add-reg', x, y };
        case 0x5: return { kind: 'sub', x, y };
        case 0x6: return { kind: 'shr', x, y };
        case 0x7: return { kind: 'subn', x, y };
        case 0xE: return { kind: 'shl', x, y };
        default: return { kind: 'unknown' };
      }
    case 0x9: return n === 0 ? { kind: 'sne-reg', x, y } : { kind: 'unknown' };
    case 0xA: return { kind: 'ld-i', addr };
    case 0xB: return { kind: 'jp-v0', addr };
    case 0xC: return { kind: 'rnd', x, nn };
    case 0xD: return { kind: 'drw', x, y, n };
    case 0xE:
      if (nn === 0x9E) return { kind: 'skp', x };
      if (nn === 0xA1) return { kind: 'sknp', x };
      return { kind: 'unknown' };
    case 0xF:
      switch (nn) {
        case 0x07: return { kind: 'ld-vx-dt', x };
        case 0x0A: return { kind: 'ld-vx-key', x };
        case 0x15: return { kind: 'ld-dt-vx', x };
        case 0x18: return { kind: 'ld-st-vx', x };
        case 0x1E: return { kind: 'add-i', x };
        case 0x29: return { kind: 'ld-font', x };
        case 0x33: return { kind: 'bcd', x };
        case 0x55: return { kind: 'store', x };
        case 0x65: return { kind: 'load', x };
        default: return { kind: 'unknown' };
      }
    default:
      return { kind: 'unknown' };
  }
}
