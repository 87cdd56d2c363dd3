import { MEMORY_SIZE, MemoryMappedRegister } from '../constants/memory';
import type { KeyboardSource } from './console';

const ADDRESS_MASK = MEMORY_SIZE - 1;

export class Memory {
  private readonly cells = new Uint16Array(MEMORY_SIZE);

  /**
   * Reads a word. A read of the keyboard status register polls `keyboard`
   * first and latches any pending key into the data register.
   */
  public read(address: number, keyboard: KeyboardSource): number {
    address &= ADDRESS_MASK;
    if (address === MemoryMappedRegister.MR_KBSR) {
      const key = keyboard.poll();
      if (key !== undefined) {
        this.cells[MemoryMappedRegister.MR_KBSR] = 1 << 15;
        this.cells[MemoryMappedRegister.MR_KBDR] = key;
      } else {
        this.cells[MemoryMappedRegister.MR_KBSR] = 0x00;
      }
    }
    return this.cells[address];
  }

  /** Raw storage access; never triggers the keyboard device. */
  public peek(address: number): number {
    return this.cells[address & ADDRESS_MASK];
  }

  public write(address: number, val: number): void {
    this.cells[address & ADDRESS_MASK] = val;
  }
}
