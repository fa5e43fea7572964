import { Trap, HALT_MESSAGE, IN_PROMPT } from '../constants/traps';
import { UnknownTrapError } from '../errors';
import { Register } from '../hardware/register';
import { writeString, type ConsoleDevice } from '../io/console';
import type { ExecutionContext } from '../instructions/handlers';

export enum RunState {
  RUNNING,
  HALTED,
}

/**
 * The TRAP service routines. Everything goes through the injected console;
 * R0 carries the argument and the result.
 */
export class TrapDispatcher {
  constructor(
    private readonly ctx: ExecutionContext,
    private readonly console: ConsoleDevice
  ) {}

  /** `address` is where the TRAP instruction sits, for diagnostics. */
  public executeTrap(vector: number, address: number): RunState {
    const { registers } = this.ctx;

    switch (vector) {
      case Trap.TRAP_GETC: {
        /* read a single ASCII char */
        registers.set(Register.R_R0, this.readChar());
        return RunState.RUNNING;
      }
      case Trap.TRAP_OUT: {
        this.console.writeChar(registers.get(Register.R_R0) & 0xff);
        return RunState.RUNNING;
      }
      case Trap.TRAP_PUTS: {
        this.puts();
        return RunState.RUNNING;
      }
      case Trap.TRAP_IN: {
        writeString(this.console, IN_PROMPT);
        const code = this.readChar();
        this.console.writeChar(code);
        registers.set(Register.R_R0, code);
        return RunState.RUNNING;
      }
      case Trap.TRAP_PUTSP: {
        this.putsp();
        return RunState.RUNNING;
      }
      case Trap.TRAP_HALT: {
        writeString(this.console, HALT_MESSAGE);
        this.console.flush();
        return RunState.HALTED;
      }
      default:
        throw new UnknownTrapError(address, vector);
    }
  }

  private readChar(): number {
    this.console.flush();
    return this.console.readChar() & 0xff;
  }

  /* one char per word */
  private puts(): void {
    let addr = this.ctx.registers.get(Register.R_R0);
    let word = this.ctx.memRead(addr);

    while (word !== 0) {
      this.console.writeChar(word & 0xff);
      addr = (addr + 1) & 0xffff;
      word = this.ctx.memRead(addr);
    }
  }

  /* two chars per word, low byte first; a zero byte ends the string */
  private putsp(): void {
    let addr = this.ctx.registers.get(Register.R_R0);
    let word = this.ctx.memRead(addr);

    while (word !== 0) {
      this.console.writeChar(word & 0xff);

      const char2 = word >> 8;
      if (char2 === 0) {
        return;
      }
      this.console.writeChar(char2);

      addr = (addr + 1) & 0xffff;
      word = this.ctx.memRead(addr);
    }
  }
}
