import path from 'node:path';
import type { Command } from 'commander';
import pc from 'picocolors';
import { loadConfig, parseMode, parseStageList, STAGES } from '../../pipeline/src/index.js';
import type { PipelineConfig, StageResult } from '../../pipeline/src/index.js';

export interface CommonOptions {
  cwd?: string;
  config?: string;
  mode?: string;
  stages?: string;
  cleanup?: boolean;
}

export interface Invocation {
  cwd: string;
  config: PipelineConfig;
  source?: string;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('-C, --cwd <dir>', 'working directory holding the toolchain sources and artifacts')
    .option('-c, --config <file>', 'config file (defaults to morningrun.config.json in the working directory)')
    .option('-m, --mode <mode>', 'unconditional | gated')
    .option('-s, --stages <list>', 'comma-separated stages to enable (build,lower,optimize,compile,run)');
}

export function applyCliOverrides(config: PipelineConfig, options: CommonOptions): PipelineConfig {
  return {
    ...config,
    ...(options.mode ? { mode: parseMode(options.mode) } : {}),
    ...(options.stages ? { stages: parseStageList(options.stages) } : {}),
    ...(options.cleanup ? { cleanupIntermediates: true } : {}),
  };
}

export async function resolveInvocation(options: CommonOptions): Promise<Invocation> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const { config, source } = await loadConfig({ cwd, configPath: options.config });
  return { cwd, source, config: applyCliOverrides(config, options) };
}

export function formatStageResult(result: StageResult): string {
  const label = STAGES[result.stage].description;
  switch (result.status) {
    case 'succeeded':
      return pc.green(`[+] ${label} (${result.durationMs}ms)`);
    case 'failed':
      return pc.red(`[!] ${label} failed: ${result.message}`);
    case 'skipped':
      return pc.yellow(`[-] ${label} skipped`);
  }
}

// driver diagnostics are off unless a level is requested
export function resolveLogLevel(option: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return option ?? env.MORNINGRUN_LOG_LEVEL ?? 'silent';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function reportFailure(prefix: string, error: unknown): void {
  console.error(pc.red(`${prefix}: ${errorMessage(error)}`));
  process.exitCode = 1;
}
