import { setImmediate } from 'timers/promises';
import { KBSR_READY, MemoryMappedRegister, PC_START } from './constants/memory';
import { OpCode } from './constants/opcodes';
import { IllegalOpcodeError } from './errors';
import { trapVectOf, opcodeOf } from './instructions/fields';
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
  type ExecutionContext,
  type InstructionHandler,
} from './instructions/handlers';
import { Memory } from './hardware/memory';
import { Register, RegisterFile } from './hardware/register';
import type { ConsoleDevice } from './io/console';
import type { ProgramImage } from './loader/image';
import { RunState, TrapDispatcher } from './traps/trap-dispatcher';

export interface VmOptions {
  console: ConsoleDevice;
  /* PC used when no image has been loaded */
  pcStart?: number;
}

const HANDLERS: Partial<Record<OpCode, InstructionHandler>> = {
  [OpCode.OP_BR]: branch,
  [OpCode.OP_ADD]: add,
  [OpCode.OP_LD]: load,
  [OpCode.OP_ST]: store,
  [OpCode.OP_JSR]: jumpRegister,
  [OpCode.OP_AND]: bitwiseAnd,
  [OpCode.OP_LDR]: loadRegister,
  [OpCode.OP_STR]: storeRegister,
  [OpCode.OP_NOT]: bitwiseNot,
  [OpCode.OP_LDI]: loadIndirect,
  [OpCode.OP_STI]: storeIndirect,
  [OpCode.OP_JMP]: jump,
  [OpCode.OP_LEA]: loadEffectiveAddress,
};

export class LC3VirtualMachine implements ExecutionContext {
  public readonly memory = new Memory();
  public readonly registers = new RegisterFile();

  private readonly console: ConsoleDevice;
  private readonly traps: TrapDispatcher;
  private state = RunState.RUNNING;
  private imageLoaded = false;

  constructor(options: VmOptions) {
    this.console = options.console;
    this.traps = new TrapDispatcher(this, this.console);
    this.registers.pc = options.pcStart ?? PC_START;
  }

  /** Copies an image into memory; the first image loaded sets the PC. */
  public loadImage(image: ProgramImage): void {
    this.memory.load(image.origin, image.words);
    if (!this.imageLoaded) {
      this.registers.pc = image.origin;
      this.imageLoaded = true;
    }
  }

  public isRunning(): boolean {
    return this.state === RunState.RUNNING;
  }

  /** Fetches, decodes and executes one instruction. Any error halts. */
  public step(): void {
    if (!this.isRunning()) {
      return;
    }
    try {
      this.execute();
    } catch (err) {
      this.state = RunState.HALTED;
      throw err;
    }
  }

  private execute(): void {
    const address = this.registers.pc;
    const instr = this.memRead(address);
    this.registers.pc++;
    const op = opcodeOf(instr);

    if (op === OpCode.OP_TRAP) {
      this.registers.set(Register.R_R7, this.registers.pc);
      this.state = this.traps.executeTrap(trapVectOf(instr), address);
      return;
    }

    const handler = HANDLERS[op];
    if (!handler) {
      /* OP_RTI and OP_RES */
      throw new IllegalOpcodeError(address, op);
    }
    handler(this, instr);
  }

  public run(): void {
    while (this.isRunning()) {
      this.step();
    }
  }

  /**
   * Same loop as `run`, handing control back to the event loop every
   * `sliceSize` instructions so signal listeners get a chance to fire.
   * Console output is flushed at each slice boundary.
   */
  public async runInSlices(sliceSize: number): Promise<void> {
    while (this.isRunning()) {
      for (let i = 0; i < sliceSize && this.isRunning(); i++) {
        this.step();
      }
      this.console.flush();
      await setImmediate();
    }
  }

  public memWrite(address: number, val: number): void {
    this.memory.write(address, val);
  }

  public memRead(address: number): number {
    if ((address & 0xffff) === MemoryMappedRegister.MR_KBSR) {
      const input = this.console.pollChar();
      if (input !== undefined) {
        this.memory.write(MemoryMappedRegister.MR_KBSR, KBSR_READY);
        this.memory.write(MemoryMappedRegister.MR_KBDR, input);
      } else {
        this.memory.write(MemoryMappedRegister.MR_KBSR, 0x00);
      }
    }
    return this.memory.read(address);
  }
}
