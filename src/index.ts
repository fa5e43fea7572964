export { LC3VirtualMachine, type VmOptions } from './lc3-vm';
export { Memory } from './hardware/memory';
export { ConditionFlag, Register, RegisterFile, type GeneralRegister } from './hardware/register';
export { OpCode } from './constants/opcodes';
export { Trap } from './constants/traps';
export { MemoryMappedRegister, MEMORY_SIZE, PC_START } from './constants/memory';
export { RunState, TrapDispatcher } from './traps/trap-dispatcher';
export { signExtend, toSigned16, wrap16, conditionFor } from './utils/arithmetic';
export type { ConsoleDevice } from './io/console';
export { MemoryConsole } from './io/memory-console';
export { TerminalConsole } from './io/terminal-console';
export { NodeTerminal, type TerminalModeController } from './io/terminal';
export { parseImage, readImageFile, type ProgramImage } from './loader/image';
export * from './errors';
export { main, ExitCode, type CliDependencies } from './main';
