import { describe, it, expect, beforeEach } from 'vitest';
import { Memory } from '../../src/hardware/memory';
import { ConditionFlag, Register, RegisterFile } from '../../src/hardware/register';

describe('Memory', () => {
  let memory: Memory;

  beforeEach(() => {
    memory = new Memory();
  });

  it('should initialize to all zeros', () => {
    expect(memory.read(0x0000)).toBe(0);
    expect(memory.read(0x3000)).toBe(0);
    expect(memory.read(0xffff)).toBe(0);
  });

  it('should read back written values', () => {
    memory.write(0x3000, 0x1234);
    memory.write(0xffff, 0xbeef);
    expect(memory.read(0x3000)).toBe(0x1234);
    expect(memory.read(0xffff)).toBe(0xbeef);
  });

  it('should wrap addresses and values to 16 bits', () => {
    memory.write(0x10042, 0x15555);
    expect(memory.read(0x0042)).toBe(0x5555);
    memory.write(0x0001, -1);
    expect(memory.read(0x0001)).toBe(0xffff);
  });

  it('should load words from an origin', () => {
    memory.load(0xfffe, [1, 2]);
    expect(memory.read(0xfffe)).toBe(1);
    expect(memory.read(0xffff)).toBe(2);
  });
});

describe('RegisterFile', () => {
  let registers: RegisterFile;

  beforeEach(() => {
    registers = new RegisterFile();
  });

  it('starts with every register zero and COND = Z', () => {
    expect(registers.pc).toBe(0);
    expect(registers.cond).toBe(ConditionFlag.FL_ZRO);
    expect(registers.snapshot()[Register.R_COND]).toBe(ConditionFlag.FL_ZRO);
  });

  it('wraps register writes and the program counter', () => {
    registers.set(Register.R_R2, 0x10001);
    expect(registers.get(Register.R_R2)).toBe(1);
    registers.pc = 0xffff;
    registers.pc++;
    expect(registers.pc).toBe(0);
  });

  it('updates flags from the register it is given', () => {
    registers.set(Register.R_R1, 0x8000);
    registers.set(Register.R_R2, 5);

    registers.updateFlags(Register.R_R1);
    expect(registers.cond).toBe(ConditionFlag.FL_NEG);

    registers.updateFlags(Register.R_R2);
    expect(registers.cond).toBe(ConditionFlag.FL_POS);

    registers.updateFlags(Register.R_R3);
    expect(registers.cond).toBe(ConditionFlag.FL_ZRO);
    expect(registers.snapshot()[Register.R_COND]).toBe(ConditionFlag.FL_ZRO);
  });
});
