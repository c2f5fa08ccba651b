import { spawn } from 'node:child_process';
import os from 'node:os';
import type { CommandOutcome, CommandRunner, CommandSpec } from '../contract.js';

// exit code a POSIX shell reports for a command it cannot find or execute
export const SPAWN_FAILURE_EXIT_CODE = 127;

export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const signo = os.constants.signals[signal];
  return typeof signo === 'number' ? 128 + signo : 1;
}

/**
 * Runs one command to completion with stdio inherited from the driver, so the
 * collaborator's own diagnostics reach the operator unchanged.
 */
export const spawnCommand: CommandRunner = (spec: CommandSpec) =>
  new Promise<CommandOutcome>(resolve => {
    let settled = false;
    const settle = (outcome: CommandOutcome) => {
      if (settled) return;
      settled = true;
      resolve(outcome);
    };

    const child = spawn(spec.command, spec.args, { cwd: spec.cwd, stdio: 'inherit' });

    child.on('error', error => {
      settle({ exitCode: SPAWN_FAILURE_EXIT_CODE, signal: null, error });
    });
    child.on('close', (code, signal) => {
      settle({ exitCode: code ?? signalExitCode(signal), signal });
    });
  });

export function formatCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...spec.args].map(quoteArg).join(' ');
}

function quoteArg(arg: string): string {
  if (arg === '') return '""';
  return /[\s"'$`\\]/.test(arg) ? `"${arg.replace(/(["$`\\])/g, '\\$1')}"` : arg;
}
