import { Command } from 'commander';
import pc from 'picocolors';
import { checkTools, selectStages } from '../../pipeline/src/index.js';
import { addCommonOptions, reportFailure, resolveInvocation } from './utils.js';
import type { CommonOptions } from './utils.js';

export function registerCheckCommand(program: Command) {
  const command = program
    .command('check')
    .description('Verify that the build command, optimizer and native compiler are installed');

  addCommonOptions(command).action(async (options: CommonOptions) => {
    try {
      const { cwd, config } = await resolveInvocation(options);
      // check what a fully activated run needs, even in gated mode
      const stages = selectStages(config, config.activationToken);
      const checks = await checkTools(config, stages, { cwd });

      if (checks.length === 0) {
        console.log(pc.yellow('No external tools are needed by the enabled stages.'));
        return;
      }

      for (const check of checks) {
        if (check.found) {
          console.log(pc.green(`[+] ${check.tool} (${check.stage}): ${check.resolvedPath}`));
        } else {
          console.error(pc.red(`[!] Required utility "${check.tool}" (${check.stage}) not found. Please install it.`));
        }
      }

      if (checks.some(check => !check.found)) {
        process.exitCode = 1;
      }
    } catch (error) {
      reportFailure('Check failed', error);
    }
  });
}
