export const MEMORY_SIZE = 65536;

/* default load address when no image declares one */
export const PC_START = 0x3000;

/** Memory Mapped Registers */
export enum MemoryMappedRegister {
  MR_KBSR = 0xfe00 /* keyboard status */,
  MR_KBDR = 0xfe02 /* keyboard data */,
}

/* KBSR bit 15: a key is waiting in KBDR */
export const KBSR_READY = 1 << 15;
