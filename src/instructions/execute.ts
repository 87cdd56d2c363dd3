import { OpCode } from '../constants/opcodes';
import type { MachineContext, StepResult } from '../context';
import { InvalidOpcodeError } from '../errors';
import { Register } from '../hardware/register';
import { handleTrap } from '../traps/handlers';
import { trapVector } from './fields';
import {
  add,
  bitwiseAnd,
  bitwiseNot,
  branch,
  jump,
  jumpRegister,
  load,
  loadEffectiveAddress,
  loadIndirect,
  loadRegister,
  store,
  storeIndirect,
  storeRegister,
} from './handlers';

const isOpCode = (value: number): value is OpCode =>
  OpCode[value] !== undefined;

export function decodeOpcode(instr: number): OpCode {
  const op = (instr & 0xffff) >> 12;
  if (!isOpCode(op)) {
    // four bits always name one of the sixteen members
    throw new RangeError(`opcode ${op} out of range`);
  }
  return op;
}

function assertNever(op: never): never {
  throw new Error(`unhandled opcode ${String(op)}`);
}

/**
 * Runs one already-fetched instruction. PC must already point past it.
 */
export function execute(ctx: MachineContext, instr: number): StepResult {
  const op = decodeOpcode(instr);

  switch (op) {
    case OpCode.OP_ADD:
      add(ctx, instr);
      return 'continue';
    case OpCode.OP_AND:
      bitwiseAnd(ctx, instr);
      return 'continue';
    case OpCode.OP_NOT:
      bitwiseNot(ctx, instr);
      return 'continue';
    case OpCode.OP_BR:
      branch(ctx, instr);
      return 'continue';
    case OpCode.OP_JMP:
      jump(ctx, instr);
      return 'continue';
    case OpCode.OP_JSR:
      jumpRegister(ctx, instr);
      return 'continue';
    case OpCode.OP_LD:
      load(ctx, instr);
      return 'continue';
    case OpCode.OP_LDI:
      loadIndirect(ctx, instr);
      return 'continue';
    case OpCode.OP_LDR:
      loadRegister(ctx, instr);
      return 'continue';
    case OpCode.OP_LEA:
      loadEffectiveAddress(ctx, instr);
      return 'continue';
    case OpCode.OP_ST:
      store(ctx, instr);
      return 'continue';
    case OpCode.OP_STI:
      storeIndirect(ctx, instr);
      return 'continue';
    case OpCode.OP_STR:
      storeRegister(ctx, instr);
      return 'continue';
    case OpCode.OP_TRAP:
      return handleTrap(ctx, trapVector(instr));
    case OpCode.OP_RES:
    case OpCode.OP_RTI:
      throw new InvalidOpcodeError(
        op,
        instr,
        (ctx.registers[Register.R_PC] - 1) & 0xffff
      );
    default:
      return assertNever(op);
  }
}
