import { mkdir, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CommandResult, CommandRunner, RunOptions } from './runner.js';

export interface RecordedCall {
  command: string;
  step: string;
  args: string[];
  timeoutMs: number;
}

export interface FakeEngineOptions {
  /** Steps that exit non-zero, with the stderr they print. */
  failures?: Record<string, { exitCode?: number; stderr?: string }>;
  /** Steps that exit 0 without writing their outputs. */
  skipOutputs?: string[];
  /** Outcome of `verify`; defaults to true. */
  verifies?: boolean;
  /** `instances` written into proof.json. */
  proofInstances?: string[][];
}

interface StepContract {
  inputs: string[];
  outputs: string[];
}

// Flags naming the files each engine command reads and writes
const CONTRACTS: Record<string, StepContract> = {
  'gen-settings': { inputs: ['-M'], outputs: ['-O'] },
  'calibrate-settings': { inputs: ['-M', '-D'], outputs: ['-O'] },
  'compile-circuit': { inputs: ['-M', '-S'], outputs: ['--compiled-circuit'] },
  'get-srs': { inputs: ['--settings-path'], outputs: ['--srs-path'] },
  setup: { inputs: ['-M', '--srs-path'], outputs: ['--vk-path', '--pk-path'] },
  'gen-witness': { inputs: ['-D', '-M'], outputs: ['-O'] },
  prove: { inputs: ['--witness', '--pk-path', '--compiled-circuit', '--srs-path'], outputs: ['--proof-path'] },
  verify: { inputs: ['--proof-path', '--vk-path', '--srs-path', '--settings-path'], outputs: [] },
  'create-evm-verifier': {
    inputs: ['--settings-path', '--vk-path', '--srs-path'],
    outputs: ['--sol-code-path'],
  },
  'encode-evm-calldata': { inputs: ['--proof-path'], outputs: ['--calldata-path'] },
};

/**
 * In-process stand-in for the proving engine. Honours the engine's argument
 * contract: refuses to run when an input file is absent and writes
 * placeholder content to every output path it is given.
 */
export class FakeEngine implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private options: FakeEngineOptions = {}) {}

  configure(options: FakeEngineOptions): void {
    this.options = { ...this.options, ...options };
  }

  steps(): string[] {
    return this.calls.map((call) => call.step);
  }

  count(step: string): number {
    return this.calls.filter((call) => call.step === step).length;
  }

  reset(): void {
    this.calls.length = 0;
  }

  async run(command: string, args: readonly string[], options: RunOptions): Promise<CommandResult> {
    const [step = '', ...rest] = args;
    this.calls.push({ command, step, args: [...args], timeoutMs: options.timeoutMs });

    if (step === '--version') {
      return ok('fake-engine 0.0.0\n');
    }

    const contract = CONTRACTS[step];
    if (!contract) {
      return fail(2, `error: unrecognized subcommand '${step}'\n`);
    }

    const failure = this.options.failures?.[step];
    if (failure) {
      return fail(failure.exitCode ?? 1, failure.stderr ?? `${step} failed\n`);
    }

    for (const flag of contract.inputs) {
      const path = flagValue(rest, flag);
      if (!path) {
        return fail(2, `error: ${step} requires ${flag}\n`);
      }
      if (!(await isFile(path))) {
        return fail(1, `error: ${path}: No such file or directory\n`);
      }
    }

    if (step === 'verify') {
      return this.options.verifies === false ? fail(1, 'verified: false\n') : ok('verified: true\n');
    }

    if (!this.options.skipOutputs?.includes(step)) {
      for (const flag of contract.outputs) {
        const path = flagValue(rest, flag);
        if (!path) {
          return fail(2, `error: ${step} requires ${flag}\n`);
        }
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, this.contentFor(step, flag));
      }
    }

    return ok(`${step} ok\n`);
  }

  private contentFor(step: string, flag: string): string {
    if (step === 'prove') {
      return JSON.stringify({ instances: this.options.proofInstances ?? [[]], proof: 'fake' });
    }
    if (step === 'gen-witness') {
      return JSON.stringify({ inputs: [], outputs: [] });
    }
    return `fake ${step} ${flag}\n`;
  }
}

function flagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index === -1 ? undefined : args[index + 1];
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

function ok(stdout: string): CommandResult {
  return { exitCode: 0, signal: null, stdout, stderr: '' };
}

function fail(exitCode: number, stderr: string): CommandResult {
  return { exitCode, signal: null, stdout: '', stderr };
}
