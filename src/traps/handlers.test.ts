import { describe, it, expect } from 'vitest';
import { Trap } from '../constants/traps';
import { InputExhaustedError } from '../errors';
import { ConditionFlag, Register } from '../hardware/register';
import { createContext } from '../test-utils';
import { handleTrap } from './handlers';

describe('handleTrap', () => {
  it('GETC should read one key without echo', () => {
    const { ctx, terminal } = createContext('ab');

    expect(handleTrap(ctx, Trap.TRAP_GETC)).toBe('continue');
    expect(ctx.registers[Register.R_R0]).toBe(0x61);
    expect(terminal.getOutput()).toBe('');
    expect(terminal.hasKey()).toBe(true);
  });

  it('GETC should leave the condition flags alone', () => {
    const { ctx } = createContext('a');
    ctx.registers[Register.R_COND] = ConditionFlag.FL_NEG;

    handleTrap(ctx, Trap.TRAP_GETC);

    expect(ctx.registers[Register.R_COND]).toBe(ConditionFlag.FL_NEG);
  });

  it('GETC should surface exhausted headless input', () => {
    const { ctx } = createContext();
    expect(() => handleTrap(ctx, Trap.TRAP_GETC)).toThrow(InputExhaustedError);
  });

  it('OUT should write the low byte of R0', () => {
    const { ctx, terminal } = createContext();
    ctx.registers[Register.R_R0] = 0x0141;

    handleTrap(ctx, Trap.TRAP_OUT);

    expect(terminal.getOutput()).toBe('A');
  });

  it('PUTS should write one character per word', () => {
    const { ctx, terminal } = createContext();
    ctx.memory.write(0x4000, 0x004f);
    ctx.memory.write(0x4001, 0x014b);
    ctx.memory.write(0x4002, 0x0000);
    ctx.memory.write(0x4003, 0x0021);
    ctx.registers[Register.R_R0] = 0x4000;

    handleTrap(ctx, Trap.TRAP_PUTS);

    expect(terminal.getOutput()).toBe('OK');
  });

  it('PUTS should wrap at the top of memory', () => {
    const { ctx, terminal } = createContext();
    ctx.memory.write(0xffff, 0x41);
    ctx.memory.write(0x0000, 0x42);
    ctx.registers[Register.R_R0] = 0xffff;

    handleTrap(ctx, Trap.TRAP_PUTS);

    expect(terminal.getOutput()).toBe('AB');
  });

  it('PUTSP should unpack two characters per word, low byte first', () => {
    const { ctx, terminal } = createContext();
    ctx.memory.write(0x4000, 0x6548); // 'H', 'e'
    ctx.memory.write(0x4001, 0x006c); // 'l', no second byte
    ctx.memory.write(0x4002, 0x0000);
    ctx.registers[Register.R_R0] = 0x4000;

    handleTrap(ctx, Trap.TRAP_PUTSP);

    expect(terminal.getOutput()).toBe('Hel');
  });

  it('IN should prompt, echo and store the key', () => {
    const { ctx, terminal } = createContext('z');

    handleTrap(ctx, Trap.TRAP_IN);

    expect(terminal.getOutput()).toBe('Enter a character: z');
    expect(ctx.registers[Register.R_R0]).toBe(0x7a);
  });

  it('HALT should announce itself and ask the loop to stop', () => {
    const { ctx, terminal } = createContext();

    expect(handleTrap(ctx, Trap.TRAP_HALT)).toBe('halt');
    expect(terminal.getOutput()).toBe('HALT\n');
  });

  it('should ignore vectors without a service routine', () => {
    const { ctx, terminal } = createContext('k');
    ctx.registers[Register.R_R0] = 0x1234;

    expect(handleTrap(ctx, 0x30)).toBe('continue');
    expect(ctx.registers[Register.R_R0]).toBe(0x1234);
    expect(terminal.getOutput()).toBe('');
    expect(terminal.hasKey()).toBe(true);
  });
});
