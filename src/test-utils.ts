/**
 * Shared helpers for the unit tests.
 */

import { PC_START } from './constants/memory';
import type { MachineContext } from './context';
import { HeadlessConsole } from './hardware/headless-console';
import { Memory } from './hardware/memory';
import { createRegisters } from './hardware/register';
import { LC3VirtualMachine } from './lc3-vm';

/** Builds an object image: big-endian origin word, then the program words. */
export function makeImage(origin: number, words: number[]): Uint8Array {
  const bytes = new Uint8Array((words.length + 1) * 2);
  const view = new DataView(bytes.buffer);
  view.setUint16(0, origin);
  words.forEach((word, i) => view.setUint16((i + 1) * 2, word));
  return bytes;
}

export function createContext(input = ''): {
  ctx: MachineContext;
  terminal: HeadlessConsole;
} {
  const terminal = new HeadlessConsole(input);
  return {
    ctx: {
      memory: new Memory(),
      registers: createRegisters(),
      console: terminal,
    },
    terminal,
  };
}

/** A machine with `program` loaded at 0x3000 and a headless console. */
export function createMachine(
  program: number[],
  input = ''
): { vm: LC3VirtualMachine; terminal: HeadlessConsole } {
  const terminal = new HeadlessConsole(input);
  const vm = new LC3VirtualMachine({ console: terminal });
  vm.loadImage(makeImage(PC_START, program));
  return { vm, terminal };
}
