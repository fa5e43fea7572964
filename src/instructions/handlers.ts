import { Register, type RegisterFile } from '../hardware/register';
import {
  baseROf,
  condOf,
  drOf,
  imm5Of,
  immFlagOf,
  longFlagOf,
  offset6Of,
  pcOffset11Of,
  pcOffset9Of,
  sr1Of,
  sr2Of,
} from './fields';

/** What an instruction handler may touch. */
export interface ExecutionContext {
  readonly registers: RegisterFile;
  memRead(address: number): number;
  memWrite(address: number, val: number): void;
}

export type InstructionHandler = (ctx: ExecutionContext, instr: number) => void;

/*
 * One function per opcode. `registers.pc` already points past the
 * instruction being executed.
 */

export function add({ registers }: ExecutionContext, instr: number): void {
  const dr = drOf(instr);
  const operand = immFlagOf(instr) ? imm5Of(instr) : registers.get(sr2Of(instr));

  registers.set(dr, registers.get(sr1Of(instr)) + operand);
  registers.updateFlags(dr);
}

export function bitwiseAnd({ registers }: ExecutionContext, instr: number): void {
  const dr = drOf(instr);
  const operand = immFlagOf(instr) ? imm5Of(instr) : registers.get(sr2Of(instr));

  registers.set(dr, registers.get(sr1Of(instr)) & operand);
  registers.updateFlags(dr);
}

export function bitwiseNot({ registers }: ExecutionContext, instr: number): void {
  const dr = drOf(instr);

  registers.set(dr, ~registers.get(sr1Of(instr)));
  registers.updateFlags(dr);
}

export function branch({ registers }: ExecutionContext, instr: number): void {
  if (condOf(instr) & registers.cond) {
    registers.pc += pcOffset9Of(instr);
  }
}

export function jump({ registers }: ExecutionContext, instr: number): void {
  /* Also handles RET */
  registers.pc = registers.get(baseROf(instr));
}

export function jumpRegister({ registers }: ExecutionContext, instr: number): void {
  /* read the base first: JSRR R7 jumps to the old R7 */
  const target = longFlagOf(instr)
    ? registers.pc + pcOffset11Of(instr) /* JSR */
    : registers.get(baseROf(instr)); /* JSRR */

  registers.set(Register.R_R7, registers.pc);
  registers.pc = target;
}

export function load(ctx: ExecutionContext, instr: number): void {
  const { registers } = ctx;
  const dr = drOf(instr);

  registers.set(dr, ctx.memRead(registers.pc + pcOffset9Of(instr)));
  registers.updateFlags(dr);
}

export function loadIndirect(ctx: ExecutionContext, instr: number): void {
  const { registers } = ctx;
  const dr = drOf(instr);

  /* the word at PC + offset holds the final address */
  registers.set(dr, ctx.memRead(ctx.memRead(registers.pc + pcOffset9Of(instr))));
  registers.updateFlags(dr);
}

export function loadRegister(ctx: ExecutionContext, instr: number): void {
  const { registers } = ctx;
  const dr = drOf(instr);

  registers.set(dr, ctx.memRead(registers.get(baseROf(instr)) + offset6Of(instr)));
  registers.updateFlags(dr);
}

export function loadEffectiveAddress({ registers }: ExecutionContext, instr: number): void {
  const dr = drOf(instr);

  registers.set(dr, registers.pc + pcOffset9Of(instr));
  registers.updateFlags(dr);
}

export function store(ctx: ExecutionContext, instr: number): void {
  const { registers } = ctx;
  ctx.memWrite(registers.pc + pcOffset9Of(instr), registers.get(drOf(instr)));
}

export function storeIndirect(ctx: ExecutionContext, instr: number): void {
  const { registers } = ctx;
  ctx.memWrite(ctx.memRead(registers.pc + pcOffset9Of(instr)), registers.get(drOf(instr)));
}

export function storeRegister(ctx: ExecutionContext, instr: number): void {
  const { registers } = ctx;
  ctx.memWrite(registers.get(baseROf(instr)) + offset6Of(instr), registers.get(drOf(instr)));
}
