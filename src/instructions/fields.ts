import { signExtend } from '../utils/bits';

/* destination register (DR), also SR for the store family */
export const dr = (instr: number): number => (instr >> 9) & 0x7;

/* first operand (SR1) or base register (BaseR) */
export const sr1 = (instr: number): number => (instr >> 6) & 0x7;

export const sr2 = (instr: number): number => instr & 0x7;

/* whether we are in immediate mode */
export const immFlag = (instr: number): boolean => ((instr >> 5) & 0x1) === 1;

export const imm5 = (instr: number): number => signExtend(instr & 0x1f, 5);

export const offset6 = (instr: number): number => signExtend(instr & 0x3f, 6);

export const pcOffset9 = (instr: number): number =>
  signExtend(instr & 0x1ff, 9);

export const pcOffset11 = (instr: number): number =>
  signExtend(instr & 0x7ff, 11);

/* n/z/p bits of BR */
export const condFlags = (instr: number): number => (instr >> 9) & 0x7;

/* JSR when set, JSRR otherwise */
export const longFlag = (instr: number): boolean => ((instr >> 11) & 1) === 1;

export const trapVector = (instr: number): number => instr & 0xff;
