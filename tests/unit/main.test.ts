import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ExitCode, USAGE, main, runToExit, type CliDependencies } from '../../src/main';
import { MemoryConsole } from '../../src/io/memory-console';
import { InterruptError } from '../../src/errors';
import { toImageBytes } from '../helpers/program';

function setup(files: Record<string, Uint8Array>, input = '') {
  const console = new MemoryConsole(input);
  const terminal = { enableRawMode: vi.fn(), restoreOriginalMode: vi.fn() };
  const logger = { log: vi.fn(), error: vi.fn() };
  const deps: CliDependencies = {
    console,
    terminal,
    logger,
    readFile: (path) => {
      const file = files[path];
      if (!file) {
        throw new Error('ENOENT');
      }
      return file;
    },
  };
  return { console, terminal, logger, deps };
}

// LEA R0, #2; PUTS; HALT; "ok"
const HELLO = toImageBytes(0x3000, [0xe002, 0xf022, 0xf025, 0x6f, 0x6b, 0]);

describe('main', () => {
  let env: ReturnType<typeof setup>;

  beforeEach(() => {
    env = setup({ 'hello.obj': HELLO, 'res.obj': toImageBytes(0x3000, [0xd000]) });
  });

  it('prints usage without arguments', async () => {
    expect(await main([], env.deps)).toBe(ExitCode.USAGE);
    expect(env.logger.log).toHaveBeenCalledWith(USAGE);
    expect(env.terminal.enableRawMode).not.toHaveBeenCalled();
  });

  it('fails before running when an image cannot be loaded', async () => {
    expect(await main(['hello.obj', 'missing.obj'], env.deps)).toBe(ExitCode.FAILURE);
    expect(env.logger.error).toHaveBeenCalledWith('failed to load image: missing.obj (ENOENT)');
    expect(env.terminal.enableRawMode).not.toHaveBeenCalled();
    expect(env.console.output).toBe('');
  });

  it('runs a program to HALT', async () => {
    expect(await main(['hello.obj'], env.deps)).toBe(ExitCode.OK);
    expect(env.console.output).toBe('okHALT\n');
    expect(env.terminal.enableRawMode).toHaveBeenCalledTimes(1);
    expect(env.terminal.restoreOriginalMode).toHaveBeenCalledTimes(1);
    expect(env.logger.error).not.toHaveBeenCalled();
  });

  it('exits non-zero with a diagnostic on a reserved opcode', async () => {
    expect(await main(['res.obj'], env.deps)).toBe(ExitCode.FAILURE);
    expect(env.logger.error).toHaveBeenCalledWith('illegal opcode OP_RES (13) at 0x3000');
    expect(env.terminal.restoreOriginalMode).toHaveBeenCalledTimes(1);
  });

  it('later images overwrite earlier ones', async () => {
    const patch = toImageBytes(0x3004, [0x21]);
    env = setup({ 'hello.obj': HELLO, 'patch.obj': patch });
    expect(await main(['hello.obj', 'patch.obj'], env.deps)).toBe(ExitCode.OK);
    expect(env.console.output).toBe('o!HALT\n');
  });

  it('restores the terminal when interrupted', async () => {
    env = setup({ 'getc.obj': toImageBytes(0x3000, [0xf020]) });
    vi.spyOn(env.console, 'readChar').mockImplementation(() => {
      throw new InterruptError();
    });
    expect(await main(['getc.obj'], env.deps)).toBe(ExitCode.INTERRUPTED);
    expect(env.terminal.restoreOriginalMode).toHaveBeenCalledTimes(1);
  });
});

describe('runToExit', () => {
  it('records the exit code instead of exiting', async () => {
    const env = setup({ 'hello.obj': HELLO });
    const target: { exitCode?: number | string | null } = {};
    await runToExit(['hello.obj'], env.deps, target);
    expect(target.exitCode).toBe(ExitCode.OK);
  });

  it('reports an unexpected error and restores the terminal', async () => {
    const env = setup({ 'getc.obj': toImageBytes(0x3000, [0xf020]) });
    const failure = new Error('boom');
    vi.spyOn(env.console, 'readChar').mockImplementation(() => {
      throw failure;
    });
    const target: { exitCode?: number | string | null } = {};

    await runToExit(['getc.obj'], env.deps, target);

    expect(target.exitCode).toBe(ExitCode.FAILURE);
    expect(env.logger.error).toHaveBeenCalledWith(failure);
    expect(env.terminal.restoreOriginalMode).toHaveBeenCalled();
  });
});
