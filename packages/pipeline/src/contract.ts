export const STAGE_NAMES = ['build', 'lower', 'optimize', 'compile', 'run'] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export type PipelineMode = 'unconditional' | 'gated';

export interface CommandSpec {
  command: string;
  args: string[];
  cwd: string;
}

export interface CommandOutcome {
  exitCode: number;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export type CommandRunner = (spec: CommandSpec) => Promise<CommandOutcome>;

export type FailureReason =
  | 'missing-input'
  | 'output-not-removable'
  | 'nonzero-exit'
  | 'spawn-error'
  | 'missing-output';

export type StageResult =
  | { stage: StageName; status: 'succeeded'; exitCode: number; durationMs: number }
  | { stage: StageName; status: 'failed'; reason: FailureReason; message: string; exitCode?: number; durationMs: number }
  | { stage: StageName; status: 'skipped' };

export interface PipelineReport {
  ok: boolean;
  stages: StageResult[];
  failedStage?: StageName;
  // only set when the run stage executed the native program
  exitStatus?: number;
}

export interface PlannedStage {
  stage: StageName;
  command: CommandSpec;
  consumes: string[];
  produces: string[];
}

export class StageFailure extends Error {
  readonly stage: StageName;
  readonly reason: FailureReason;
  readonly exitCode?: number;

  constructor(stage: StageName, reason: FailureReason, message: string, exitCode?: number) {
    super(message);
    this.name = 'StageFailure';
    this.stage = stage;
    this.reason = reason;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends Error {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
