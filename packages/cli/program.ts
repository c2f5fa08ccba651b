import { Command } from 'commander';
import type { CommandRunner } from '../pipeline/src/index.js';
import { registerCheckCommand } from './commands/check.js';
import { registerCleanCommand } from './commands/clean.js';
import { registerRunCommand } from './commands/run.js';

export interface ProgramDependencies {
  runner?: CommandRunner;
}

export function createProgram(deps: ProgramDependencies = {}): Command {
  const program = new Command();

  program
    .name('morningrun')
    .description('morningrun - build, lower, natively compile and run a Morning.lang program')
    .version('0.1.0');

  registerRunCommand(program, deps.runner);
  registerCheckCommand(program);
  registerCleanCommand(program);

  return program;
}
