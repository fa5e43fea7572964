import { InterruptError, VmError } from './errors';
import { LC3VirtualMachine } from './lc3-vm';
import type { ConsoleDevice } from './io/console';
import { TerminalConsole } from './io/terminal-console';
import { NodeTerminal, type TerminalModeController } from './io/terminal';
import { readImageFile, type ProgramImage } from './loader/image';

export const RUN_SLICE_SIZE = 10000;

export const USAGE = 'usage: lc3-vm [image-file1] ...';

export enum ExitCode {
  OK = 0,
  FAILURE = 1,
  USAGE = 2,
  INTERRUPTED = 130,
}

export interface CliDependencies {
  console?: ConsoleDevice;
  terminal?: TerminalModeController;
  logger?: Pick<Console, 'log' | 'error'>;
  readFile?: (path: string) => Uint8Array;
}

/**
 * Loads every image named in `args`, then runs until HALT. Resolves to the
 * process exit code.
 */
export async function main(args: string[], deps: CliDependencies = {}): Promise<number> {
  const logger = deps.logger ?? console;

  if (args.length < 1) {
    logger.log(USAGE);
    return ExitCode.USAGE;
  }

  const images: ProgramImage[] = [];
  for (const imagePath of args) {
    try {
      images.push(readImageFile(imagePath, deps.readFile));
    } catch (err) {
      if (!(err instanceof VmError)) {
        throw err;
      }
      logger.error(err.message);
      return ExitCode.FAILURE;
    }
  }

  const vmConsole = deps.console ?? new TerminalConsole();
  const terminal = deps.terminal ?? new NodeTerminal();
  const vm = new LC3VirtualMachine({ console: vmConsole });
  for (const image of images) {
    vm.loadImage(image);
  }

  terminal.enableRawMode();
  try {
    await vm.runInSlices(RUN_SLICE_SIZE);
    return ExitCode.OK;
  } catch (err) {
    if (!(err instanceof VmError)) {
      throw err;
    }
    vmConsole.flush();
    logger.error(err.message);
    return err instanceof InterruptError ? ExitCode.INTERRUPTED : ExitCode.FAILURE;
  } finally {
    terminal.restoreOriginalMode();
  }
}

/* the part of `process` that `runToExit` sets */
export interface ExitTarget {
  exitCode?: number | string | null;
}

/**
 * Runs `main` and records its result as the exit code instead of exiting,
 * so buffered stdout and stderr drain first.
 */
export async function runToExit(
  args: string[],
  deps: CliDependencies,
  target: ExitTarget = process
): Promise<void> {
  try {
    target.exitCode = await main(args, deps);
  } catch (err) {
    deps.terminal?.restoreOriginalMode();
    target.exitCode = ExitCode.FAILURE;
    (deps.logger ?? console).error(err);
  }
}
