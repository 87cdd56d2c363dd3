import { MEMORY_SIZE } from '../constants/memory';
import { Trap } from '../constants/traps';
import type { MachineContext, StepResult } from '../context';
import { Register } from '../hardware/register';

export const IN_PROMPT = 'Enter a character: ';
export const HALT_NOTICE = 'HALT\n';

const encode = (text: string): number[] =>
  Array.from(text, (char) => char.charCodeAt(0) & 0xff);

/**
 * Collects the zero-terminated string starting at `address`. The scan wraps at
 * the top of memory and gives up after one full pass.
 */
function readString(
  ctx: MachineContext,
  address: number,
  unpack: (word: number, buf: number[]) => void
): number[] {
  const buf: number[] = [];
  for (let i = 0; i < MEMORY_SIZE; i++) {
    const word = ctx.memory.peek(address + i);
    if (word === 0) {
      break;
    }
    unpack(word, buf);
  }
  return buf;
}

export function handleTrap(ctx: MachineContext, vector: number): StepResult {
  const { registers, console } = ctx;

  switch (vector) {
    case Trap.TRAP_GETC: {
      /* read a single ASCII char */
      registers[Register.R_R0] = console.read();
      break;
    }
    case Trap.TRAP_OUT: {
      console.write([registers[Register.R_R0] & 0xff]);
      break;
    }
    case Trap.TRAP_PUTS: {
      /* one char per word */
      console.write(
        readString(ctx, registers[Register.R_R0], (word, buf) => {
          buf.push(word & 0xff);
        })
      );
      break;
    }
    case Trap.TRAP_IN: {
      console.write(encode(IN_PROMPT));
      const char = console.read();
      console.write([char & 0xff]);
      registers[Register.R_R0] = char;
      break;
    }
    case Trap.TRAP_PUTSP: {
      /* one char per byte (two bytes per word), low byte first */
      console.write(
        readString(ctx, registers[Register.R_R0], (word, buf) => {
          buf.push(word & 0xff);
          const char2 = word >> 8;
          if (char2) {
            buf.push(char2);
          }
        })
      );
      break;
    }
    case Trap.TRAP_HALT: {
      console.write(encode(HALT_NOTICE));
      return 'halt';
    }
    // other vectors have no service routine and do nothing
  }

  return 'continue';
}
