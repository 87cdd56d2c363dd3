import { memRead, type MachineContext } from '../context';
import { Register, updateFlags } from '../hardware/register';
import {
  condFlags,
  dr,
  imm5,
  immFlag,
  longFlag,
  offset6,
  pcOffset11,
  pcOffset9,
  sr1,
  sr2,
} from './fields';

/*
 * Registers are a Uint16Array, so every assignment below wraps modulo 2^16.
 * Memory masks its own addresses.
 */

export function add(ctx: MachineContext, instr: number): void {
  const { registers } = ctx;
  const r0 = dr(instr);
  const r1 = sr1(instr);

  if (immFlag(instr)) {
    registers[r0] = registers[r1] + imm5(instr);
  } else {
    registers[r0] = registers[r1] + registers[sr2(instr)];
  }

  updateFlags(registers, r0);
}

export function bitwiseAnd(ctx: MachineContext, instr: number): void {
  const { registers } = ctx;
  const r0 = dr(instr);
  const r1 = sr1(instr);

  if (immFlag(instr)) {
    registers[r0] = registers[r1] & imm5(instr);
  } else {
    registers[r0] = registers[r1] & registers[sr2(instr)];
  }

  updateFlags(registers, r0);
}

export function bitwiseNot(ctx: MachineContext, instr: number): void {
  const { registers } = ctx;
  const r0 = dr(instr);

  registers[r0] = ~registers[sr1(instr)];

  updateFlags(registers, r0);
}

export function branch(ctx: MachineContext, instr: number): void {
  const { registers } = ctx;
  if (condFlags(instr) & registers[Register.R_COND]) {
    registers[Register.R_PC] += pcOffset9(instr);
  }
}

/** Also handles RET (JMP R7). */
export function jump(ctx: MachineContext, instr: number): void {
  const { registers } = ctx;
  registers[Register.R_PC] = registers[sr1(instr)];
}

export function jumpRegister(ctx: MachineContext, instr: number): void {
  const { registers } = ctx;
  // read before R7 is overwritten so JSRR R7 still jumps to the old value
  const target = registers[sr1(instr)];

  registers[Register.R_R7] = registers[Register.R_PC];
  if (longFlag(instr)) {
    registers[Register.R_PC] += pcOffset11(instr); /* JSR */
  } else {
    registers[Register.R_PC] = target; /* JSRR */
  }
}

export function load(ctx: MachineContext, instr: number): void {
  const { registers } = ctx;
  const r0 = dr(instr);
  registers[r0] = memRead(ctx, registers[Register.R_PC] + pcOffset9(instr));

  updateFlags(registers, r0);
}

export function loadIndirect(ctx: MachineContext, instr: number): void {
  const { registers } = ctx;
  const r0 = dr(instr);

  /* add pc_offset to the current PC, look at that memory location to get the
     final address */
  registers[r0] = memRead(
    ctx,
    memRead(ctx, registers[Register.R_PC] + pcOffset9(instr))
  );

  updateFlags(registers, r0);
}

export function loadRegister(ctx: MachineContext, instr: number): void {
  const { registers } = ctx;
  const r0 = dr(instr);
  registers[r0] = memRead(ctx, registers[sr1(instr)] + offset6(instr));

  updateFlags(registers, r0);
}

export function loadEffectiveAddress(
  ctx: MachineContext,
  instr: number
): void {
  const { registers } = ctx;
  const r0 = dr(instr);
  registers[r0] = registers[Register.R_PC] + pcOffset9(instr);

  updateFlags(registers, r0);
}

export function store(ctx: MachineContext, instr: number): void {
  const { registers, memory } = ctx;
  memory.write(
    registers[Register.R_PC] + pcOffset9(instr),
    registers[dr(instr)]
  );
}

export function storeIndirect(ctx: MachineContext, instr: number): void {
  const { registers, memory } = ctx;
  memory.write(
    memRead(ctx, registers[Register.R_PC] + pcOffset9(instr)),
    registers[dr(instr)]
  );
}

export function storeRegister(ctx: MachineContext, instr: number): void {
  const { registers, memory } = ctx;
  memory.write(
    registers[sr1(instr)] + offset6(instr),
    registers[dr(instr)]
  );
}
