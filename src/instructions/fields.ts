import { OpCode } from '../constants/opcodes';
import { type GeneralRegister, generalRegister } from '../hardware/register';
import { signExtend } from '../utils/arithmetic';

/*
 * Bit-field readers for a 16-bit instruction word. Offsets come back
 * already sign extended to 16 bits.
 */

const OPCODES = [
  OpCode.OP_BR,
  OpCode.OP_ADD,
  OpCode.OP_LD,
  OpCode.OP_ST,
  OpCode.OP_JSR,
  OpCode.OP_AND,
  OpCode.OP_LDR,
  OpCode.OP_STR,
  OpCode.OP_RTI,
  OpCode.OP_NOT,
  OpCode.OP_LDI,
  OpCode.OP_STI,
  OpCode.OP_JMP,
  OpCode.OP_RES,
  OpCode.OP_LEA,
  OpCode.OP_TRAP,
] as const;

/* bits [15:12] */
export function opcodeOf(instr: number): OpCode {
  return OPCODES[(instr >> 12) & 0xf];
}

/* destination register (DR), bits [11:9]; also SR for the stores */
export function drOf(instr: number): GeneralRegister {
  return generalRegister(instr >> 9);
}

/* first operand (SR1), bits [8:6] */
export function sr1Of(instr: number): GeneralRegister {
  return generalRegister(instr >> 6);
}

/* base register, bits [8:6] */
export function baseROf(instr: number): GeneralRegister {
  return generalRegister(instr >> 6);
}

/* second operand (SR2), bits [2:0] */
export function sr2Of(instr: number): GeneralRegister {
  return generalRegister(instr);
}

/* nzp mask of BR, bits [11:9] */
export function condOf(instr: number): number {
  return (instr >> 9) & 0x7;
}

/* bit 5 of ADD/AND */
export function immFlagOf(instr: number): boolean {
  return ((instr >> 5) & 0x1) === 1;
}

/* bit 11 of JSR/JSRR */
export function longFlagOf(instr: number): boolean {
  return ((instr >> 11) & 0x1) === 1;
}

export function imm5Of(instr: number): number {
  return signExtend(instr & 0x1f, 5);
}

export function offset6Of(instr: number): number {
  return signExtend(instr & 0x3f, 6);
}

export function pcOffset9Of(instr: number): number {
  return signExtend(instr & 0x1ff, 9);
}

export function pcOffset11Of(instr: number): number {
  return signExtend(instr & 0x7ff, 11);
}

export function trapVectOf(instr: number): number {
  return instr & 0xff;
}
