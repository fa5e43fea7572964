#!/usr/bin/env node
import { writeSync } from 'fs';
import { NodeTerminal } from './io/terminal';
import { TerminalConsole } from './io/terminal-console';
import { ExitCode, runToExit } from './main';

const terminal = new NodeTerminal();
const vmConsole = new TerminalConsole();

function onInterrupt(): void {
  vmConsole.flush();
  terminal.restoreOriginalMode();
  writeSync(process.stdout.fd, '\n');
  process.exit(ExitCode.INTERRUPTED);
}

process.on('SIGINT', onInterrupt);

void runToExit(process.argv.slice(2), { terminal, console: vmConsole }).then(() => {
  process.off('SIGINT', onInterrupt);
});
