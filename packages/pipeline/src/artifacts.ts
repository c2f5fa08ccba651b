import fs from 'node:fs/promises';
import path from 'node:path';
import type { PipelineConfig } from './config/index.js';

export type ArtifactName = keyof PipelineConfig['artifacts'];

export type ArtifactPaths = Record<ArtifactName, string>;

export function resolveArtifacts(config: PipelineConfig, cwd: string): ArtifactPaths {
  return {
    toolchain: path.resolve(cwd, config.artifacts.toolchain),
    ir: path.resolve(cwd, config.artifacts.ir),
    optimizedIr: path.resolve(cwd, config.artifacts.optimizedIr),
    executable: path.resolve(cwd, config.artifacts.executable),
  };
}

export type ArtifactState = 'present' | 'missing' | 'empty';

export async function inspectArtifact(filePath: string): Promise<ArtifactState> {
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) return 'missing';
    return stat.size === 0 ? 'empty' : 'present';
  } catch {
    return 'missing';
  }
}

export async function removeArtifact(filePath: string): Promise<boolean> {
  try {
    await fs.rm(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Removes everything the pipeline produces except the toolchain executable,
 * which belongs to the build procedure.
 */
export async function cleanArtifacts(config: PipelineConfig, cwd: string): Promise<string[]> {
  const artifacts = resolveArtifacts(config, cwd);
  const removed: string[] = [];
  for (const target of [artifacts.ir, artifacts.optimizedIr, artifacts.executable]) {
    if (await removeArtifact(target)) {
      removed.push(target);
    }
  }
  return removed;
}
