import { MEMORY_SIZE } from '../constants/memory';
import { wrap16 } from '../utils/arithmetic';

/**
 * 65536 words of 16-bit storage. Addresses and values wrap to 16 bits.
 * Device registers live in `LC3VirtualMachine.memRead`, not here.
 */
export class Memory {
  private readonly cells = new Uint16Array(MEMORY_SIZE);

  public read(address: number): number {
    return this.cells[wrap16(address)];
  }

  public write(address: number, val: number): void {
    this.cells[wrap16(address)] = wrap16(val);
  }

  /** Copies `words` verbatim starting at `origin`. */
  public load(origin: number, words: ArrayLike<number>): void {
    for (let pos = 0; pos < words.length; pos++) {
      this.write(origin + pos, words[pos]);
    }
  }
}
