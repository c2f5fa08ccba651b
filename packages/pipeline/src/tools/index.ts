import fs from 'node:fs/promises';
import { constants } from 'node:fs';
import path from 'node:path';
import type { PipelineConfig } from '../config/index.js';
import type { StageName } from '../contract.js';

export interface ToolCheck {
  stage: StageName;
  tool: string;
  found: boolean;
  resolvedPath?: string;
}

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves a command the way a shell would: names containing a path separator
 * are taken relative to cwd, bare names are searched on PATH.
 */
export async function findExecutable(
  command: string,
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<string | undefined> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (command.includes('/') || command.includes(path.sep)) {
    const candidate = path.resolve(cwd, command);
    return (await isExecutable(candidate)) ? candidate : undefined;
  }

  const searchPath = env.PATH ?? '';
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

// Collaborators that must be installed before the enabled stages can run.
// The toolchain and the native executable are produced by the pipeline itself.
export function requiredTools(config: PipelineConfig, stages: readonly StageName[]): Array<{ stage: StageName; tool: string }> {
  const tools: Array<{ stage: StageName; tool: string }> = [];
  if (stages.includes('build')) tools.push({ stage: 'build', tool: config.build.command });
  if (stages.includes('optimize')) tools.push({ stage: 'optimize', tool: config.optimizer.command });
  if (stages.includes('compile')) tools.push({ stage: 'compile', tool: config.nativeCompiler.command });
  return tools;
}

export async function checkTools(
  config: PipelineConfig,
  stages: readonly StageName[],
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<ToolCheck[]> {
  const checks: ToolCheck[] = [];
  for (const { stage, tool } of requiredTools(config, stages)) {
    const resolvedPath = await findExecutable(tool, options);
    checks.push({ stage, tool, found: resolvedPath !== undefined, resolvedPath });
  }
  return checks;
}
