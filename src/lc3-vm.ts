import { PC_START } from './constants/memory';
import { memRead, type MachineContext } from './context';
import { TerminalConsole, type Console } from './hardware/console';
import { Memory } from './hardware/memory';
import {
  createRegisters,
  Register,
  type RegisterFile,
} from './hardware/register';
import { execute } from './instructions/execute';
import {
  loadImage,
  loadImageFile,
  type LoadedImage,
  type LoadResult,
} from './loader/image';

export type MachineState = 'running' | 'halted';

export interface LC3VirtualMachineOptions {
  console?: Console;
  memory?: Memory;
  registers?: RegisterFile;
  /** address of the first instruction, 0x3000 unless given */
  pcStart?: number;
}

export class LC3VirtualMachine {
  public readonly context: MachineContext;
  private readonly pcStart: number;
  private _state: MachineState = 'running';

  constructor(options: LC3VirtualMachineOptions = {}) {
    this.context = {
      memory: options.memory ?? new Memory(),
      registers: options.registers ?? createRegisters(),
      console: options.console ?? new TerminalConsole(),
    };
    this.pcStart = options.pcStart ?? PC_START;
    this.context.registers[Register.R_PC] = this.pcStart;
  }

  public get state(): MachineState {
    return this._state;
  }

  public get registers(): RegisterFile {
    return this.context.registers;
  }

  public get memory(): Memory {
    return this.context.memory;
  }

  public loadImage(image: Uint8Array): LoadedImage {
    return loadImage(this.context.memory, image);
  }

  public loadImageFile(imagePath: string): LoadResult {
    return loadImageFile(this.context.memory, imagePath);
  }

  /** Puts the PC back at the start address and resumes the running state. */
  public reset(): void {
    this.context.registers[Register.R_PC] = this.pcStart;
    this._state = 'running';
  }

  /**
   * Fetches, decodes and executes a single instruction. Does nothing once
   * halted. Throws InvalidOpcodeError for RTI and the reserved opcode.
   */
  public step(): MachineState {
    if (this._state === 'halted') {
      return this._state;
    }

    const { registers } = this.context;
    const instr = memRead(this.context, registers[Register.R_PC]);
    registers[Register.R_PC]++;

    if (execute(this.context, instr) === 'halt') {
      this._state = 'halted';
    }
    return this._state;
  }

  public run(): void {
    while (this._state === 'running') {
      this.step();
    }
  }
}
