import { writeSync } from 'fs';
import { keyIn } from 'readline-sync';
import { InputClosedError, InterruptError } from '../errors';
import type { ConsoleDevice } from './console';

const CTRL_C = 0x03;
const CR = 0x0d;
const LF = 0x0a;
/* flush early once this many bytes are waiting */
const MAX_PENDING = 4096;

/**
 * Console on the host terminal. Keys are read one at a time through
 * readline-sync. Output is line buffered and written straight to the
 * stdout descriptor, so it also lands before the next blocking read.
 * Keys outside 8-bit range are skipped.
 */
export class TerminalConsole implements ConsoleDevice {
  private outputBuffer: number[] = [];

  constructor(
    private readonly write: (data: Uint8Array) => void = (data) => {
      writeSync(process.stdout.fd, data);
    }
  ) {}

  public readChar(): number {
    this.flush();

    let code = this.readKey();
    while (code > 0xff) {
      code = this.readKey();
    }
    if (code === CTRL_C) {
      throw new InterruptError();
    }
    return code === CR ? LF : code;
  }

  /* readline-sync has no non-blocking read, so polling waits for a key */
  public pollChar(): number | undefined {
    return this.readChar();
  }

  public writeChar(code: number): void {
    const byte = code & 0xff;
    this.outputBuffer.push(byte);
    if (byte === LF || this.outputBuffer.length >= MAX_PENDING) {
      this.flush();
    }
  }

  public flush(): void {
    if (this.outputBuffer.length === 0) {
      return;
    }
    const data = Buffer.from(this.outputBuffer);
    this.outputBuffer = [];
    this.write(data);
  }

  private readKey(): number {
    const input = keyIn('', { hideEchoBack: true, mask: '' });
    if (input.length === 0) {
      throw new InputClosedError();
    }
    return input.codePointAt(0) ?? 0;
  }
}
