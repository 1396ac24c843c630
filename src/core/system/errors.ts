import type { Word } from '@core/cpu/types';
import type { Instruction } from '@core/cpu/instruction';

const hex = (v: number, width: number): string => `0x${v.toString(16).toUpperCase().padStart(width, '0')}`;

export class RomTooBigError extends Error {
  constructor(readonly excess: number) {
    super(`ROM size exceeds the RAM available to programs by ${excess} bytes`);
    this.name = 'RomTooBigError';
  }
}

// PC ran past the end of RAM; the normal end of a program
export class NoMoreInstructionsError extends Error {
  constructor(readonly pc: Word) {
    super(`No more instructions to run (pc=${hex(pc, 3)})`);
    this.name = 'NoMoreInstructionsError';
  }
}

export class UnknownInstructionError extends Error {
  // pc is the program counter after the fetch advanced it
  constructor(readonly instruction: Instruction, readonly pc: Word) {
    super(`Instruction opcode ${instruction.toString()} at ${hex(pc, 3)} is unknown`);
    this.name = 'UnknownInstructionError';
  }
}

export type CycleError = NoMoreInstructionsError | UnknownInstructionError;

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));
