import { InputClosedError } from '../errors';
import type { ConsoleDevice } from './console';

/** In-process console fed from a string; output is collected in memory. */
export class MemoryConsole implements ConsoleDevice {
  private inputBuffer: number[] = [];
  private outputBuffer = '';
  private written = '';

  constructor(input = '') {
    this.sendString(input);
  }

  public sendString(str: string): void {
    for (let i = 0; i < str.length; i++) {
      this.inputBuffer.push(str.charCodeAt(i) & 0xff);
    }
  }

  public readChar(): number {
    const code = this.inputBuffer.shift();
    if (code === undefined) {
      throw new InputClosedError();
    }
    return code;
  }

  public pollChar(): number | undefined {
    return this.inputBuffer.shift();
  }

  public writeChar(code: number): void {
    this.outputBuffer += String.fromCharCode(code & 0xff);
  }

  public flush(): void {
    this.written += this.outputBuffer;
    this.outputBuffer = '';
  }

  /** Everything flushed so far. */
  public get output(): string {
    return this.written;
  }

  /** Written but not yet flushed. */
  public get pending(): string {
    return this.outputBuffer;
  }
}
