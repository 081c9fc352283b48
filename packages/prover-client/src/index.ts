import { stat, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ExternalToolError, InconsistentToolOutputError } from '@zkscore/errors';
import { timeoutFor, type EngineConfig, type Logger, type ProverStep } from '@zkscore/config';
import { spawnRunner, type CommandRunner, type CommandResult } from './runner.js';

export * from './runner.js';
export { FakeEngine, type FakeEngineOptions, type RecordedCall } from './fake-engine.js';

const STDERR_EXCERPT_LENGTH = 2000;

export interface ToolOutput {
  step: ProverStep;
  artifacts: string[];
  stdout: string;
}

export interface VerifyResult {
  verified: boolean;
  detail: string;
}

export interface CompileParams {
  model: string;
  settings: string;
  compiledCircuit: string;
}

export interface SettingsParams {
  model: string;
  settings: string;
}

export interface CalibrateParams {
  model: string;
  calibrationInput: string;
  settings: string;
}

export interface ReferenceStringParams {
  settings: string;
  referenceString: string;
}

export interface SetupParams {
  compiledCircuit: string;
  referenceString: string;
  provingKey: string;
  verificationKey: string;
}

export interface WitnessParams {
  input: string;
  compiledCircuit: string;
  witness: string;
}

export interface ProveParams {
  witness: string;
  provingKey: string;
  compiledCircuit: string;
  referenceString: string;
  proof: string;
}

export interface VerifyParams {
  proof: string;
  verificationKey: string;
  referenceString: string;
  settings: string;
}

export interface EvmVerifierParams {
  settings: string;
  verificationKey: string;
  referenceString: string;
  contract: string;
}

export interface CalldataParams {
  proof: string;
  calldata: string;
}

export function stderrExcerpt(text: string): string {
  return text.length > STDERR_EXCERPT_LENGTH ? text.slice(-STDERR_EXCERPT_LENGTH) : text;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * One method per engine command. Each call blocks until the process exits,
 * then checks that the files the command is contracted to write are there.
 * Artifact contents are never inspected.
 */
export class ExternalProverClient {
  constructor(
    private readonly engine: EngineConfig,
    private readonly runner: CommandRunner = spawnRunner,
    private readonly logger: Logger = console
  ) {}

  compileCircuit(params: CompileParams): Promise<ToolOutput> {
    return this.invoke(
      'compile-circuit',
      ['-M', params.model, '--compiled-circuit', params.compiledCircuit, '-S', params.settings],
      [params.compiledCircuit]
    );
  }

  generateSettings(params: SettingsParams): Promise<ToolOutput> {
    return this.invoke('gen-settings', ['-M', params.model, '-O', params.settings], [params.settings]);
  }

  calibrateSettings(params: CalibrateParams): Promise<ToolOutput> {
    return this.invoke(
      'calibrate-settings',
      ['-M', params.model, '-D', params.calibrationInput, '-O', params.settings],
      [params.settings]
    );
  }

  downloadReferenceString(params: ReferenceStringParams): Promise<ToolOutput> {
    return this.invoke(
      'get-srs',
      ['--settings-path', params.settings, '--srs-path', params.referenceString],
      [params.referenceString]
    );
  }

  runSetup(params: SetupParams): Promise<ToolOutput> {
    return this.invoke(
      'setup',
      [
        '-M', params.compiledCircuit,
        '--srs-path', params.referenceString,
        '--vk-path', params.verificationKey,
        '--pk-path', params.provingKey,
      ],
      [params.provingKey, params.verificationKey]
    );
  }

  generateWitness(params: WitnessParams): Promise<ToolOutput> {
    return this.invoke(
      'gen-witness',
      ['-D', params.input, '-M', params.compiledCircuit, '-O', params.witness],
      [params.witness]
    );
  }

  prove(params: ProveParams): Promise<ToolOutput> {
    return this.invoke(
      'prove',
      [
        '--witness', params.witness,
        '--proof-path', params.proof,
        '--pk-path', params.provingKey,
        '--compiled-circuit', params.compiledCircuit,
        '--srs-path', params.referenceString,
      ],
      [params.proof]
    );
  }

  /**
   * A non-zero exit is a failed verification, not a tool error; the engine
   * exits unsuccessfully on a proof that does not check out. Only a process
   * that could not run at all throws.
   */
  async verify(params: VerifyParams): Promise<VerifyResult> {
    const args = [
      'verify',
      '--proof-path', params.proof,
      '--vk-path', params.verificationKey,
      '--srs-path', params.referenceString,
      '--settings-path', params.settings,
    ];
    const result = await this.execute('verify', args);

    if (result.exitCode === null) {
      throw this.toolError('verify', result);
    }
    if (result.exitCode !== 0) {
      return { verified: false, detail: stderrExcerpt(result.stderr || result.stdout).trim() };
    }
    if (/verified:\s*false/i.test(result.stdout)) {
      return { verified: false, detail: result.stdout.trim() };
    }
    return { verified: true, detail: result.stdout.trim() };
  }

  createEvmVerifier(params: EvmVerifierParams): Promise<ToolOutput> {
    return this.invoke(
      'create-evm-verifier',
      [
        '--settings-path', params.settings,
        '--vk-path', params.verificationKey,
        '--srs-path', params.referenceString,
        '--sol-code-path', params.contract,
      ],
      [params.contract]
    );
  }

  encodeCalldata(params: CalldataParams): Promise<ToolOutput> {
    return this.invoke(
      'encode-evm-calldata',
      ['--proof-path', params.proof, '--calldata-path', params.calldata],
      [params.calldata]
    );
  }

  async version(): Promise<string> {
    const result = await this.execute('version', ['--version']);
    if (result.exitCode !== 0) {
      throw this.toolError('version', result);
    }
    return result.stdout.trim();
  }

  private async invoke(step: ProverStep, args: string[], outputs: string[]): Promise<ToolOutput> {
    for (const dir of new Set(outputs.map((output) => dirname(output)))) {
      await mkdir(dir, { recursive: true });
    }

    const result = await this.execute(step, [step, ...args]);
    if (result.exitCode !== 0) {
      throw this.toolError(step, result);
    }

    const missing: string[] = [];
    for (const output of outputs) {
      if (!(await isFile(output))) {
        missing.push(output);
      }
    }
    if (missing.length > 0) {
      throw new InconsistentToolOutputError(step, missing);
    }

    return { step, artifacts: outputs, stdout: result.stdout };
  }

  private async execute(step: ProverStep, argv: string[]): Promise<CommandResult> {
    const timeoutMs = timeoutFor(this.engine, step);
    this.logger.info(`[zkscore] $ ${this.engine.command} ${argv.join(' ')}`);
    return this.runner.run(this.engine.command, argv, { timeoutMs });
  }

  private toolError(step: ProverStep, result: CommandResult): ExternalToolError {
    const text = result.stderr || result.error?.message || '';
    return new ExternalToolError(step, result.exitCode, stderrExcerpt(text), result.error ? { cause: result.error } : undefined);
  }
}
