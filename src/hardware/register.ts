export enum Register {
  R_R0,
  R_R1,
  R_R2,
  R_R3,
  R_R4,
  R_R5,
  R_R6,
  R_R7,
  R_PC /* program counter */,
  R_COND,
  R_COUNT,
}

export enum ConditionFlag {
  FL_POS = 1 << 0 /* P */,
  FL_ZRO = 1 << 1 /* Z */,
  FL_NEG = 1 << 2 /* N */,
}

export type RegisterFile = Uint16Array;

const SIGN_BIT = 1 << 15;

export function createRegisters(): RegisterFile {
  const registers = new Uint16Array(Register.R_COUNT);
  registers[Register.R_COND] = ConditionFlag.FL_ZRO;
  return registers;
}

export function updateFlags(registers: RegisterFile, r: number): void {
  if (registers[r] === 0) {
    registers[Register.R_COND] = ConditionFlag.FL_ZRO;
  } else if (registers[r] & SIGN_BIT) {
    /* a 1 in the left-most bit indicates negative */
    registers[Register.R_COND] = ConditionFlag.FL_NEG;
  } else {
    registers[Register.R_COND] = ConditionFlag.FL_POS;
  }
}
