import { ConditionFlag } from '../constants/flags';
import { conditionFor, wrap16 } from '../utils/arithmetic';

export { ConditionFlag };

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

export type GeneralRegister =
  | Register.R_R0
  | Register.R_R1
  | Register.R_R2
  | Register.R_R3
  | Register.R_R4
  | Register.R_R5
  | Register.R_R6
  | Register.R_R7;

const GENERAL_REGISTERS = [
  Register.R_R0,
  Register.R_R1,
  Register.R_R2,
  Register.R_R3,
  Register.R_R4,
  Register.R_R5,
  Register.R_R6,
  Register.R_R7,
] as const;

/** Maps a 3-bit register field onto R0..R7. */
export function generalRegister(index: number): GeneralRegister {
  return GENERAL_REGISTERS[index & 0x7];
}

/**
 * R0..R7, PC and COND. COND always holds exactly one of P, Z or N and
 * only changes through `updateFlags`.
 */
export class RegisterFile {
  private readonly words = new Uint16Array(Register.R_COUNT);
  private condition: ConditionFlag = ConditionFlag.FL_ZRO;

  constructor() {
    this.words[Register.R_COND] = this.condition;
  }

  public get(r: GeneralRegister): number {
    return this.words[r];
  }

  public set(r: GeneralRegister, value: number): void {
    this.words[r] = wrap16(value);
  }

  public get pc(): number {
    return this.words[Register.R_PC];
  }

  public set pc(value: number) {
    this.words[Register.R_PC] = wrap16(value);
  }

  public get cond(): ConditionFlag {
    return this.condition;
  }

  /** Must run after the write to `r`, with the register that changed. */
  public updateFlags(r: GeneralRegister): void {
    this.condition = conditionFor(this.words[r]);
    this.words[Register.R_COND] = this.condition;
  }

  public snapshot(): Uint16Array {
    return this.words.slice();
  }
}
