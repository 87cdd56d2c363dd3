export const MEMORY_SIZE = 65536;

/** default load/start address for user programs */
export const PC_START = 0x3000;

/** Memory Mapped Registers */
export enum MemoryMappedRegister {
  MR_KBSR = 0xfe00 /* keyboard status */,
  MR_KBDR = 0xfe02 /* keyboard data */,
}
