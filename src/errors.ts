import { OpCode } from './constants/opcodes';

function hex(word: number): string {
  return `0x${word.toString(16).padStart(4, '0')}`;
}

/** Base class for every error that ends a run. */
export class VmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ImageLoadError extends VmError {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`failed to load image: ${path} (${reason})`);
    this.path = path;
    this.reason = reason;
  }
}

export class IllegalOpcodeError extends VmError {
  readonly address: number;
  readonly opcode: OpCode;

  constructor(address: number, opcode: OpCode) {
    super(`illegal opcode ${OpCode[opcode]} (${opcode}) at ${hex(address)}`);
    this.address = address;
    this.opcode = opcode;
  }
}

export class UnknownTrapError extends VmError {
  readonly address: number;
  readonly vector: number;

  constructor(address: number, vector: number) {
    super(`unknown trap vector 0x${vector.toString(16).padStart(2, '0')} at ${hex(address)}`);
    this.address = address;
    this.vector = vector;
  }
}

export class InputClosedError extends VmError {
  constructor() {
    super('console input closed');
  }
}

export class InterruptError extends VmError {
  constructor() {
    super('interrupted');
  }
}
