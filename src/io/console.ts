/**
 * Character I/O seen by the trap routines and the keyboard registers.
 * Codes are 8-bit character codes.
 */
export interface ConsoleDevice {
  /** Blocks until one character is available. Does not echo. */
  readChar(): number;
  /** A waiting character, or `undefined` when none is available. */
  pollChar(): number | undefined;
  writeChar(code: number): void;
  /** Pushes buffered output out; runs before every blocking read. */
  flush(): void;
}

export function writeString(console: ConsoleDevice, text: string): void {
  for (let i = 0; i < text.length; i++) {
    console.writeChar(text.charCodeAt(i));
  }
}
