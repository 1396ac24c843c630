export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface Chip8State {
  v: Uint8Array; // V0..VF, VF doubles as carry/borrow/collision flag
  i: Word; // index register
  pc: Word;
  dt: Byte; // delay timer
  st: Byte; // sound timer
  stack: Word[]; // return addresses
}
