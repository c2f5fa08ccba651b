import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, STAGE_NAMES, UsageError } from '../contract.js';
import type { PipelineMode, StageName } from '../contract.js';

export const CONFIG_FILE = 'morningrun.config.json';

export const DEFAULT_STAGES: readonly StageName[] = ['build', 'lower', 'compile', 'run'];

// last stage that still runs in gated mode when the activation token is absent
const GATE_BOUNDARY: StageName = 'lower';

const FORBIDDEN_NAME_CHARS = '\\:*?"<>|';

export function isValidArtifactName(name: string): boolean {
  if (!name) return false;
  return ![...name].some(ch => FORBIDDEN_NAME_CHARS.includes(ch));
}

const artifactPath = z
  .string()
  .min(1, 'path must not be empty')
  .refine(p => isValidArtifactName(path.basename(p)), {
    message: `file name must not contain any of ${FORBIDDEN_NAME_CHARS}`,
  });

const flags = z.array(z.string());

export const configSchema = z
  .object({
    mode: z.enum(['unconditional', 'gated']).default('unconditional'),
    activationToken: z.string().min(1).default('run'),
    stages: z.array(z.enum(STAGE_NAMES)).min(1).optional(),
    cleanupIntermediates: z.boolean().default(false),
    build: z
      .object({
        command: z.string().min(1).default('bash'),
        args: flags.default(['build.sh', 'all']),
      })
      .default({}),
    toolchain: z.object({ args: flags.default([]) }).default({}),
    optimizer: z
      .object({
        command: z.string().min(1).default('opt'),
        flags: flags.default(['-O3', '-S']),
      })
      .default({}),
    nativeCompiler: z
      .object({
        command: z.string().min(1).default('clang++'),
        flags: flags.default(['-O3', '-Igc', '-lgc']),
      })
      .default({}),
    program: z.object({ args: flags.default([]) }).default({}),
    artifacts: z
      .object({
        toolchain: artifactPath.default('build/bin/morninglang'),
        ir: artifactPath.default('out.ll'),
        optimizedIr: artifactPath.default('out-opt.ll'),
        executable: artifactPath.default('out.bin'),
      })
      .default({}),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    const seen = new Map<string, string>();
    for (const [key, value] of Object.entries(cfg.artifacts)) {
      const normalized = path.normalize(value);
      const previous = seen.get(normalized);
      if (previous) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['artifacts', key],
          message: `same path as artifacts.${previous}`,
        });
      } else {
        seen.set(normalized, key);
      }
    }
  });

export type PipelineConfig = z.infer<typeof configSchema>;
export type PipelineConfigInput = z.input<typeof configSchema>;

export interface LoadedConfig {
  config: PipelineConfig;
  // undefined when no config file was found and defaults were used
  source?: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function parseConfig(raw: unknown): PipelineConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;
  const explicit = options.configPath !== undefined;
  const configPath = path.resolve(cwd, options.configPath ?? CONFIG_FILE);

  let raw: unknown = {};
  let source: string | undefined;
  try {
    const content = await fs.readFile(configPath, 'utf8');
    raw = parseJson(content, configPath);
    source = configPath;
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    if (!explicit && isMissingFile(error)) {
      raw = {};
    } else {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read config file "${configPath}": ${message}`);
    }
  }

  if (!isRecord(raw)) {
    throw new ConfigError(`Config file "${configPath}" must contain a JSON object.`);
  }

  return { config: parseConfig(applyEnvOverrides(raw, env)), source };
}

export function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  return {
    ...raw,
    ...(env.MORNINGRUN_MODE ? { mode: env.MORNINGRUN_MODE } : {}),
    build: withField(raw.build, 'command', env.MORNINGRUN_BUILD_COMMAND),
    optimizer: withField(raw.optimizer, 'command', env.MORNINGRUN_OPTIMIZER),
    nativeCompiler: withField(raw.nativeCompiler, 'command', env.MORNINGRUN_NATIVE_COMPILER),
  };
}

export function parseMode(value: string): PipelineMode {
  if (value === 'unconditional' || value === 'gated') return value;
  throw new UsageError(`Unknown mode "${value}" (expected unconditional or gated)`);
}

export function parseStageList(value: string): StageName[] {
  const names = value
    .split(',')
    .map(part => part.trim())
    .filter(Boolean);
  if (names.length === 0) {
    throw new UsageError('Stage list must name at least one stage');
  }
  return names.map(name => {
    const stage = STAGE_NAMES.find(candidate => candidate === name);
    if (!stage) {
      throw new UsageError(`Unknown stage "${name}" (expected one of ${STAGE_NAMES.join(', ')})`);
    }
    return stage;
  });
}

export function orderStages(stages: readonly StageName[]): StageName[] {
  return STAGE_NAMES.filter(stage => stages.includes(stage));
}

/**
 * Resolves the enabled stages for one invocation. The token, when given, must be
 * the configured activation token; in gated mode its absence cuts the pipeline
 * off after lowering.
 */
export function selectStages(config: PipelineConfig, token?: string): StageName[] {
  if (token !== undefined && token !== config.activationToken) {
    throw new UsageError(`Unrecognized argument "${token}" (the only accepted token is "${config.activationToken}")`);
  }

  const enabled = orderStages(config.stages ?? DEFAULT_STAGES);
  if (config.mode === 'gated' && token === undefined) {
    const boundary = STAGE_NAMES.indexOf(GATE_BOUNDARY);
    return enabled.filter(stage => STAGE_NAMES.indexOf(stage) <= boundary);
  }
  return enabled;
}

function parseJson(content: string, file: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file "${file}" is not valid JSON: ${message}`);
  }
}

function withField(section: unknown, key: string, value: string | undefined): unknown {
  if (!value) return section;
  if (section === undefined) return { [key]: value };
  if (isRecord(section)) return { ...section, [key]: value };
  return section;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
