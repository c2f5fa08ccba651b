import { Command } from 'commander';
import pc from 'picocolors';
import { createLogger, formatCommand, planPipeline, runPipeline, selectStages, STAGES } from '../../pipeline/src/index.js';
import type { CommandRunner } from '../../pipeline/src/index.js';
import { addCommonOptions, formatStageResult, reportFailure, resolveInvocation, resolveLogLevel } from './utils.js';
import type { CommonOptions } from './utils.js';

interface RunCommandOptions extends CommonOptions {
  dryRun?: boolean;
  exitWithStatus?: boolean;
  logLevel?: string;
}

export function registerRunCommand(program: Command, runner?: CommandRunner) {
  const command = program
    .command('pipeline [token]', { isDefault: true })
    .description('Build the toolchain, lower the program to IR, compile it natively and run it');

  addCommonOptions(command)
    .option('--cleanup', 'remove the IR files once the native executable is built', false)
    .option('--dry-run', 'print the commands each enabled stage would run', false)
    .option('--exit-with-status', "exit with the program's own exit status", false)
    .option('--log-level <level>', 'pino log level for driver diagnostics on stderr')
    .action(async (token: string | undefined, options: RunCommandOptions) => {
      try {
        const { cwd, config, source } = await resolveInvocation(options);
        const stages = selectStages(config, token);
        const logger = createLogger({ level: resolveLogLevel(options.logLevel) });
        logger.debug({ source: source ?? 'defaults', mode: config.mode, stages }, 'configuration loaded');

        if (options.dryRun) {
          planPipeline(config, { cwd, stages }).forEach(planned => {
            console.log(`${pc.cyan(planned.stage.padEnd(8))} ${formatCommand(planned.command)}`);
          });
          return;
        }

        const report = await runPipeline(config, {
          cwd,
          stages,
          runner,
          logger,
          onStageStart: planned => console.log(pc.cyan(`==> ${STAGES[planned.stage].description}`)),
          onStageFinish: result => {
            const line = formatStageResult(result);
            if (result.status === 'failed') {
              console.error(line);
            } else {
              console.log(line);
            }
          },
        });

        if (!report.ok) {
          process.exitCode = 1;
          return;
        }

        // the program's exit status is the last thing the operator sees
        if (report.exitStatus !== undefined) {
          console.log(String(report.exitStatus));
          if (options.exitWithStatus) {
            process.exitCode = report.exitStatus;
          }
        }
      } catch (error) {
        reportFailure('Pipeline failed', error);
      }
    });
}
