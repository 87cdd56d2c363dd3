import { describe, it, expect } from 'vitest';
import { MemoryMappedRegister } from '../constants/memory';
import { HeadlessConsole } from './headless-console';
import { Memory } from './memory';

describe('Memory', () => {
  it('should store and return words', () => {
    const memory = new Memory();
    const keyboard = new HeadlessConsole();

    memory.write(0x3000, 0xbeef);

    expect(memory.read(0x3000, keyboard)).toBe(0xbeef);
    expect(memory.peek(0x3000)).toBe(0xbeef);
  });

  it('should wrap addresses to 16 bits', () => {
    const memory = new Memory();

    memory.write(0x10005, 9);
    memory.write(-1, 7);

    expect(memory.peek(5)).toBe(9);
    expect(memory.peek(0xffff)).toBe(7);
  });

  it('should latch a pending key when the status register is read', () => {
    const memory = new Memory();
    const keyboard = new HeadlessConsole('x');

    expect(memory.read(MemoryMappedRegister.MR_KBSR, keyboard)).toBe(0x8000);
    expect(memory.peek(MemoryMappedRegister.MR_KBDR)).toBe(0x78);
    expect(keyboard.hasKey()).toBe(false);
  });

  it('should clear the status register when no key is pending', () => {
    const memory = new Memory();
    const keyboard = new HeadlessConsole('q');

    memory.read(MemoryMappedRegister.MR_KBSR, keyboard);
    expect(memory.read(MemoryMappedRegister.MR_KBSR, keyboard)).toBe(0);
    // data register keeps the last key
    expect(memory.peek(MemoryMappedRegister.MR_KBDR)).toBe(0x71);
  });

  it('should not poll when the data register is read', () => {
    const memory = new Memory();
    const keyboard = new HeadlessConsole('x');

    expect(memory.read(MemoryMappedRegister.MR_KBDR, keyboard)).toBe(0);
    expect(keyboard.hasKey()).toBe(true);
  });

  it('should treat writes to the status register as plain storage', () => {
    const memory = new Memory();

    memory.write(MemoryMappedRegister.MR_KBSR, 0x1234);

    expect(memory.peek(MemoryMappedRegister.MR_KBSR)).toBe(0x1234);
    const keyboard = new HeadlessConsole();
    expect(memory.read(MemoryMappedRegister.MR_KBSR, keyboard)).toBe(0);
  });
});
