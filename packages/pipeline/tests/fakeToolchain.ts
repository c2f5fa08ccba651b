import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { CommandOutcome, CommandRunner, CommandSpec } from '../src/index.js';

export type FakeHandler = (spec: CommandSpec) => Promise<number | CommandOutcome>;

export const SAMPLE_IR = 'define i32 @main() {\n  ret i32 42\n}\n';

const workdirs: string[] = [];

export async function makeWorkdir(prefix = 'morningrun-'): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  workdirs.push(dir);
  return dir;
}

export async function removeWorkdirs(): Promise<void> {
  const dirs = workdirs.splice(0);
  await Promise.all(dirs.map(dir => fs.rm(dir, { recursive: true, force: true })));
}

async function writeFile(cwd: string, relative: string, content: string): Promise<void> {
  const target = path.resolve(cwd, relative);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, 'utf8');
}

// Stand-ins for the build script, toolchain, optimizer, native compiler and
// produced program, keyed by the basename of the command they answer to.
export function defaultHandlers(programStatus = 42): Record<string, FakeHandler> {
  return {
    bash: async spec => {
      await writeFile(spec.cwd, 'build/bin/morninglang', '#!toolchain\n');
      return 0;
    },
    morninglang: async spec => {
      await writeFile(spec.cwd, 'out.ll', SAMPLE_IR);
      return 0;
    },
    opt: async spec => {
      const input = await fs.readFile(path.resolve(spec.cwd, spec.args[0]), 'utf8');
      await writeFile(spec.cwd, spec.args[spec.args.length - 1], `; optimized\n${input}`);
      return 0;
    },
    'clang++': async spec => {
      const outIndex = spec.args.indexOf('-o');
      const input = await fs.readFile(path.resolve(spec.cwd, spec.args[outIndex - 1]), 'utf8');
      await writeFile(spec.cwd, spec.args[outIndex + 1], `binary:${input}`);
      return 0;
    },
    'out.bin': async () => programStatus,
  };
}

export function createFakeRunner(overrides: Record<string, FakeHandler> = {}, programStatus = 42) {
  const handlers = { ...defaultHandlers(programStatus), ...overrides };
  const calls: CommandSpec[] = [];

  const runner: CommandRunner = async spec => {
    calls.push(spec);
    const handler = handlers[path.basename(spec.command)];
    if (!handler) {
      return { exitCode: 127, signal: null, error: new Error(`spawn ${spec.command} ENOENT`) };
    }
    const result = await handler(spec);
    return typeof result === 'number' ? { exitCode: result, signal: null } : result;
  };

  return { runner, calls, commands: () => calls.map(call => path.basename(call.command)) };
}
