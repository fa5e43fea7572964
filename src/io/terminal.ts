/** Brackets a run: raw mode on entry, the original mode on exit. */
export interface TerminalModeController {
  enableRawMode(): void;
  restoreOriginalMode(): void;
}

/* the part of tty.ReadStream this needs */
export interface RawModeStream {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Switches a TTY stdin into raw mode and back. Does nothing when stdin is
 * not a terminal. Restoring twice is harmless.
 */
export class NodeTerminal implements TerminalModeController {
  private originalRaw: boolean | undefined;

  constructor(private readonly stdin: RawModeStream = process.stdin) {}

  public enableRawMode(): void {
    if (!this.stdin.isTTY || !this.stdin.setRawMode) {
      return;
    }
    this.originalRaw = this.stdin.isRaw ?? false;
    this.stdin.setRawMode(true);
  }

  public restoreOriginalMode(): void {
    if (this.originalRaw === undefined || !this.stdin.setRawMode) {
      return;
    }
    this.stdin.setRawMode(this.originalRaw);
    this.originalRaw = undefined;
  }
}
