import type { Console } from './hardware/console';
import type { Memory } from './hardware/memory';
import type { RegisterFile } from './hardware/register';

/** Everything an instruction can touch. One context per running program. */
export interface MachineContext {
  readonly memory: Memory;
  readonly registers: RegisterFile;
  readonly console: Console;
}

/** What the dispatch loop should do after an instruction has executed. */
export type StepResult = 'continue' | 'halt';

export function memRead(ctx: MachineContext, address: number): number {
  return ctx.memory.read(address, ctx.console);
}
