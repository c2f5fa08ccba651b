import path from 'node:path';
import { inspectArtifact, removeArtifact, resolveArtifacts } from './artifacts.js';
import { orderStages, selectStages } from './config/index.js';
import type { PipelineConfig } from './config/index.js';
import { StageFailure } from './contract.js';
import type { CommandRunner, PipelineReport, PlannedStage, StageName, StageResult } from './contract.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import { formatCommand, spawnCommand } from './process/index.js';
import { STAGES } from './stages/index.js';
import type { StageContext, StageDefinition } from './stages/index.js';

export * from './contract.js';
export {
  CONFIG_FILE,
  DEFAULT_STAGES,
  configSchema,
  isValidArtifactName,
  loadConfig,
  orderStages,
  parseConfig,
  parseMode,
  parseStageList,
  selectStages,
} from './config/index.js';
export type { LoadedConfig, PipelineConfig, PipelineConfigInput } from './config/index.js';
export { cleanArtifacts, inspectArtifact, resolveArtifacts } from './artifacts.js';
export type { ArtifactPaths, ArtifactState } from './artifacts.js';
export { formatCommand, signalExitCode, spawnCommand, SPAWN_FAILURE_EXIT_CODE } from './process/index.js';
export { checkTools, findExecutable, requiredTools } from './tools/index.js';
export type { ToolCheck } from './tools/index.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { STAGES } from './stages/index.js';

export interface PlanOptions {
  cwd?: string;
  // defaults to the stages selected by the config without an activation token
  stages?: readonly StageName[];
}

export interface RunPipelineOptions extends PlanOptions {
  runner?: CommandRunner;
  logger?: Logger;
  onStageStart?: (stage: PlannedStage) => void;
  onStageFinish?: (result: StageResult) => void;
}

export function planPipeline(config: PipelineConfig, options: PlanOptions = {}): PlannedStage[] {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const enabled = orderStages(options.stages ?? selectStages(config));
  const ctx: StageContext = { config, cwd, artifacts: resolveArtifacts(config, cwd), enabled };

  return enabled.map(name => {
    const definition = STAGES[name];
    const { command, args } = definition.command(ctx);
    return {
      stage: name,
      command: { command, args, cwd },
      consumes: definition.consumes(ctx),
      produces: definition.produces(ctx),
    };
  });
}

/**
 * Runs the enabled stages in order and stops at the first one that fails.
 * Stages after a failure are reported as skipped; the native program's exit
 * status is only present when the run stage executed it.
 */
export async function runPipeline(config: PipelineConfig, options: RunPipelineOptions = {}): Promise<PipelineReport> {
  const runner = options.runner ?? spawnCommand;
  const logger = options.logger ?? silentLogger;
  const plan = planPipeline(config, options);
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const artifacts = resolveArtifacts(config, cwd);

  const results: StageResult[] = [];
  let failedStage: StageName | undefined;
  let exitStatus: number | undefined;

  for (const planned of plan) {
    if (failedStage) {
      const skipped: StageResult = { stage: planned.stage, status: 'skipped' };
      results.push(skipped);
      options.onStageFinish?.(skipped);
      continue;
    }

    options.onStageStart?.(planned);
    const result = await executeStage(planned, STAGES[planned.stage], runner, logger);
    results.push(result);
    options.onStageFinish?.(result);

    if (result.status === 'failed') {
      failedStage = planned.stage;
      continue;
    }

    if (planned.stage === 'run' && result.status === 'succeeded') {
      exitStatus = result.exitCode;
    }

    if (planned.stage === 'compile' && config.cleanupIntermediates) {
      for (const target of [artifacts.ir, artifacts.optimizedIr]) {
        try {
          if (await removeArtifact(target)) {
            logger.debug({ file: target }, 'removed intermediate file');
          }
        } catch (error) {
          // the executable is built; a leftover IR file is only logged
          logger.warn({ file: target, err: error }, 'could not remove intermediate file');
        }
      }
    }
  }

  return { ok: failedStage === undefined, stages: results, failedStage, exitStatus };
}

async function executeStage(
  planned: PlannedStage,
  definition: StageDefinition,
  runner: CommandRunner,
  logger: Logger,
): Promise<StageResult> {
  const { stage } = planned;
  const commandLine = formatCommand(planned.command);
  const startedAt = Date.now();

  try {
    for (const input of planned.consumes) {
      const state = await inspectArtifact(input);
      if (state !== 'present') {
        throw new StageFailure(stage, 'missing-input', `Required input "${input}" ${describeState(state)}`);
      }
    }

    if (definition.replacesOutputs) {
      for (const output of planned.produces) {
        try {
          await removeArtifact(output);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          throw new StageFailure(stage, 'output-not-removable', `Cannot remove previous output "${output}": ${message}`);
        }
      }
    }

    logger.info({ stage, command: commandLine }, 'stage started');
    const outcome = await runner(planned.command);

    if (outcome.error) {
      throw new StageFailure(stage, 'spawn-error', `Cannot run "${commandLine}": ${outcome.error.message}`, outcome.exitCode);
    }
    if (definition.failsOnNonzeroExit && outcome.exitCode !== 0) {
      throw new StageFailure(stage, 'nonzero-exit', `"${commandLine}" exited with code ${outcome.exitCode}`, outcome.exitCode);
    }

    for (const output of planned.produces) {
      const state = await inspectArtifact(output);
      if (state !== 'present') {
        throw new StageFailure(stage, 'missing-output', `Expected output "${output}" ${describeState(state)}`, outcome.exitCode);
      }
    }

    const durationMs = Date.now() - startedAt;
    logger.info({ stage, exitCode: outcome.exitCode, durationMs }, 'stage finished');
    return { stage, status: 'succeeded', exitCode: outcome.exitCode, durationMs };
  } catch (error) {
    if (!(error instanceof StageFailure)) throw error;
    const durationMs = Date.now() - startedAt;
    logger.error({ stage, reason: error.reason, exitCode: error.exitCode, durationMs }, error.message);
    return {
      stage,
      status: 'failed',
      reason: error.reason,
      message: error.message,
      exitCode: error.exitCode,
      durationMs,
    };
  }
}

function describeState(state: 'missing' | 'empty'): string {
  return state === 'empty' ? 'is empty' : 'does not exist';
}
