import type { ArtifactPaths } from '../artifacts.js';
import type { PipelineConfig } from '../config/index.js';
import type { StageName } from '../contract.js';

export interface StageContext {
  config: PipelineConfig;
  cwd: string;
  artifacts: ArtifactPaths;
  enabled: readonly StageName[];
}

export interface StageDefinition {
  description: string;
  command(ctx: StageContext): { command: string; args: string[] };
  consumes(ctx: StageContext): string[];
  produces(ctx: StageContext): string[];
  // remove previous outputs before running, so a stale artifact never passes as fresh output
  replacesOutputs: boolean;
  // the run stage reports the program's status instead of failing on it
  failsOnNonzeroExit: boolean;
}

export function nativeCompilerInput(ctx: StageContext): { relative: string; absolute: string } {
  if (ctx.enabled.includes('optimize')) {
    return { relative: ctx.config.artifacts.optimizedIr, absolute: ctx.artifacts.optimizedIr };
  }
  return { relative: ctx.config.artifacts.ir, absolute: ctx.artifacts.ir };
}

const build: StageDefinition = {
  description: 'Build the toolchain',
  command: ({ config }) => ({ command: config.build.command, args: [...config.build.args] }),
  consumes: () => [],
  produces: ({ artifacts }) => [artifacts.toolchain],
  replacesOutputs: false,
  failsOnNonzeroExit: true,
};

const lower: StageDefinition = {
  description: 'Lower the program to IR',
  command: ({ config, artifacts }) => ({ command: artifacts.toolchain, args: [...config.toolchain.args] }),
  consumes: ({ artifacts }) => [artifacts.toolchain],
  produces: ({ artifacts }) => [artifacts.ir],
  replacesOutputs: true,
  failsOnNonzeroExit: true,
};

const optimize: StageDefinition = {
  description: 'Optimize the IR',
  command: ({ config }) => ({
    command: config.optimizer.command,
    args: [config.artifacts.ir, ...config.optimizer.flags, '-o', config.artifacts.optimizedIr],
  }),
  consumes: ({ artifacts }) => [artifacts.ir],
  produces: ({ artifacts }) => [artifacts.optimizedIr],
  replacesOutputs: true,
  failsOnNonzeroExit: true,
};

const compile: StageDefinition = {
  description: 'Compile the IR to a native executable',
  command: ctx => ({
    command: ctx.config.nativeCompiler.command,
    args: [...ctx.config.nativeCompiler.flags, nativeCompilerInput(ctx).relative, '-o', ctx.config.artifacts.executable],
  }),
  consumes: ctx => [nativeCompilerInput(ctx).absolute],
  produces: ({ artifacts }) => [artifacts.executable],
  replacesOutputs: true,
  failsOnNonzeroExit: true,
};

const run: StageDefinition = {
  description: 'Run the native executable',
  command: ({ config, artifacts }) => ({ command: artifacts.executable, args: [...config.program.args] }),
  consumes: ({ artifacts }) => [artifacts.executable],
  produces: () => [],
  replacesOutputs: false,
  failsOnNonzeroExit: false,
};

export const STAGES: Record<StageName, StageDefinition> = { build, lower, optimize, compile, run };
