import { Command } from 'commander';
import pc from 'picocolors';
import { cleanArtifacts } from '../../pipeline/src/index.js';
import { addCommonOptions, reportFailure, resolveInvocation } from './utils.js';
import type { CommonOptions } from './utils.js';

export function registerCleanCommand(program: Command) {
  const command = program
    .command('clean')
    .description('Remove the IR files and the native executable');

  addCommonOptions(command).action(async (options: CommonOptions) => {
    try {
      const { cwd, config } = await resolveInvocation(options);
      const removed = await cleanArtifacts(config, cwd);
      if (removed.length === 0) {
        console.log(pc.yellow('Nothing to clean.'));
        return;
      }
      console.log(pc.cyan('Removed:'));
      removed.forEach(file => console.log(`  - ${file}`));
    } catch (error) {
      reportFailure('Clean failed', error);
    }
  });
}
