import { Command } from 'commander';
import { resolve } from 'node:path';
import { z } from 'zod';
import { loadConfig, type ConfigOverrides, type Logger, type PipelineConfig } from '@zkscore/config';
import { UsageError, describeError } from '@zkscore/errors';
import {
  PipelineOrchestrator,
  type DispatchOutcome,
  type GenerateOutcome,
  type Invocation,
  type SetupOutcome,
  type SubjectOutcome,
} from '@zkscore/orchestrator';
import type { CommandRunner } from '@zkscore/prover-client';
import { formatOutcome } from '@zkscore/reconcile';

export const VERSION = '0.1.0';

/** Everything the CLI takes from its process. */
export interface CliContext {
  cwd: string;
  env: Record<string, string | undefined>;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  logger: Logger;
  setExitCode: (code: number) => void;
  runner?: CommandRunner;
}

type GlobalOptions = {
  config?: string;
  sharedRoot?: string;
  json?: boolean;
};

const FeaturesSchema = z.array(z.number().finite()).min(1);

function parseCount(value: string): number {
  // Left as NaN when malformed so invocation validation reports it.
  return /^\d+$/.test(value) ? Number(value) : Number.NaN;
}

function parseScore(value: string): number {
  const score = Number(value);
  if (value.trim() === '' || !Number.isFinite(score)) {
    throw new UsageError(`--score must be a number, got "${value}"`);
  }
  return score;
}

function parseFeatures(value: string): number[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new UsageError('--features must be a JSON array of numbers');
  }
  const result = FeaturesSchema.safeParse(parsed);
  if (!result.success) {
    throw new UsageError('--features must be a non-empty JSON array of numbers');
  }
  return result.data;
}

function failedStage(subject: SubjectOutcome): string {
  const stage = subject.run.stages.find((s) => s.status === 'failed');
  if (stage) return stage.stage;
  return subject.run.success ? 'register' : 'preconditions';
}

export function buildProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('zkscore')
    .description('Zero-knowledge proofs for scoring model outputs')
    .version(VERSION)
    .option('--config <file>', 'Path to zkscore.config.json')
    .option('--shared-root <dir>', 'Directory holding the shared circuit artifacts')
    .option('--json', 'Output as JSON');

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();
  const abs = (path: string): string => resolve(ctx.cwd, path);

  const quietWhenJson = (): Logger =>
    globals().json ? { info: () => undefined, warn: ctx.logger.warn, error: ctx.logger.error } : ctx.logger;

  const config = (overrides: ConfigOverrides = {}): Promise<PipelineConfig> => {
    const { config: configPath, sharedRoot } = globals();
    return loadConfig({
      cwd: ctx.cwd,
      ...(configPath !== undefined && { configPath }),
      env: ctx.env,
      overrides: { ...(sharedRoot !== undefined && { sharedRoot }), ...overrides },
    });
  };

  const orchestrator = async (overrides?: ConfigOverrides): Promise<PipelineOrchestrator> =>
    new PipelineOrchestrator(await config(overrides), {
      logger: quietWhenJson(),
      ...(ctx.runner && { runner: ctx.runner }),
    });

  const json = (value: unknown): void => ctx.stdout(JSON.stringify(value, null, 2));

  // Any thrown error becomes "Error: ..." on stderr and exit code 1.
  const guarded =
    <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (error) {
        ctx.stderr(`Error: ${describeError(error)}`);
        ctx.setExitCode(1);
      }
    };

  const reportSetup = (outcome: SetupOutcome): void => {
    const { build } = outcome;
    if (globals().json) {
      json({
        mode: outcome.mode,
        success: outcome.success,
        state: build.state,
        steps: build.steps,
        ...(build.failedStep && { failedStep: build.failedStep }),
        ...(build.error && { error: build.error.message }),
      });
    } else {
      for (const step of build.steps) {
        ctx.stdout(`[${step.outcome === 'ran' ? 'RAN' : 'SKIP'}] ${step.step}: ${step.message}`);
      }
      if (outcome.success) {
        ctx.stdout('Shared circuit artifacts ready.');
      }
    }
    if (!outcome.success && build.failedStep) {
      ctx.stderr(`Error: stage "${build.failedStep}" failed: ${build.error?.message ?? 'unknown error'}`);
    }
    ctx.setExitCode(outcome.exitCode);
  };

  const reportGenerate = (outcome: GenerateOutcome): void => {
    if (globals().json) {
      json({
        mode: outcome.mode,
        success: outcome.success,
        subjects: outcome.subjects.map((subject) => ({
          subjectId: subject.run.subjectId,
          subjectDir: subject.subjectDir,
          success: subject.success,
          stages: subject.run.stages,
          ...(subject.run.reconciliation && { reconciliation: subject.run.reconciliation }),
          ...(subject.registry && { registry: subject.registry }),
          ...(subject.error && { error: subject.error.message, failedStage: failedStage(subject) }),
        })),
      });
    } else {
      for (const subject of outcome.subjects) {
        const id = subject.run.subjectId;
        if (subject.success) {
          ctx.stdout(`[PASS] ${id}`);
        } else {
          ctx.stdout(`[FAIL] ${id}: stage "${failedStage(subject)}" failed: ${subject.error?.message ?? 'unknown error'}`);
        }
        if (subject.run.reconciliation) {
          ctx.stdout(`  ${formatOutcome(subject.run.reconciliation)}`);
        }
        if (subject.registry) {
          ctx.stdout(`  registered proof ${subject.registry.proofHash}`);
        }
      }
    }
    const failed = outcome.subjects.filter((subject) => !subject.success).length;
    if (failed > 0) {
      ctx.stderr(`Error: ${failed} of ${outcome.subjects.length} subject(s) failed`);
    }
    ctx.setExitCode(outcome.exitCode);
  };

  const report = (outcome: DispatchOutcome): void => {
    if (outcome.mode === 'setup') {
      reportSetup(outcome);
    } else {
      reportGenerate(outcome);
    }
  };

  program
    .command('setup-common')
    .description('Compile the circuit, fetch the reference string and generate keys (once per model)')
    .requiredOption('--model <path>', 'Model file (ONNX)')
    .requiredOption('--srs <path>', 'Where the reference string is kept')
    .option('--calibration-input <path>', 'Sample input used to calibrate settings')
    .action(
      guarded(async (options: { model: string; srs: string; calibrationInput?: string }) => {
        const invocation: Invocation = {
          modelPath: abs(options.model),
          referenceStringPath: abs(options.srs),
          ...(options.calibrationInput !== undefined && { calibrationInput: abs(options.calibrationInput) }),
        };
        report(await (await orchestrator()).dispatch(invocation));
      })
    );

  program
    .command('generate')
    .description('Generate and verify proofs for one or more subject directories')
    .argument('<subjectDir...>', 'Subject directories holding input.json')
    .option('--generate-contract', 'Also write the verifier contract and calldata')
    .option('--register', 'Record each proof in the registry')
    .option('--concurrency <n>', 'Subjects proven at once', parseCount, 1)
    .option('--srs <path>', 'Reference string, when not in the shared directory')
    .action(
      guarded(
        async (
          subjectDirs: string[],
          options: { generateContract?: boolean; register?: boolean; concurrency: number; srs?: string }
        ) => {
          const overrides = options.srs !== undefined ? { referenceStringPath: options.srs } : {};
          const outcome = await (await orchestrator(overrides)).dispatch({
            subjectDirs: subjectDirs.map(abs),
            generateContract: options.generateContract ?? false,
            register: options.register ?? false,
            concurrency: options.concurrency,
          });
          report(outcome);
        }
      )
    );

  program
    .command('run')
    .description('Run common setup or per-subject proofs, depending on the inputs given')
    .option('--model <path>', 'Model file (ONNX)')
    .option('--srs <path>', 'Reference string path')
    .option('--subject-dir <dir...>', 'Subject directories')
    .option('--generate-contract', 'Also write the verifier contract and calldata')
    .action(
      guarded(async (options: { model?: string; srs?: string; subjectDir?: string[]; generateContract?: boolean }) => {
        const outcome = await (await orchestrator()).dispatch({
          ...(options.model !== undefined && { modelPath: abs(options.model) }),
          ...(options.srs !== undefined && { referenceStringPath: abs(options.srs) }),
          subjectDirs: (options.subjectDir ?? []).map(abs),
          generateContract: options.generateContract ?? false,
        });
        report(outcome);
      })
    );

  program
    .command('verify')
    .description('Verify an existing proof from its subject directory')
    .argument('<subjectDir>', 'Subject directory holding proof.json, vk.key and settings.json')
    .action(
      guarded(async (subjectDir: string) => {
        const outcome = await (await orchestrator()).verifySubject(abs(subjectDir));
        if (globals().json) {
          json({ subjectId: outcome.subjectId, verified: outcome.verified, detail: outcome.detail });
        } else if (outcome.verified) {
          ctx.stdout(`Proof verified: ${outcome.subjectId}`);
        }
        if (!outcome.success) {
          ctx.stderr(`Error: ${outcome.error?.message ?? outcome.detail}`);
        }
        ctx.setExitCode(outcome.exitCode);
      })
    );

  program
    .command('register')
    .description('Record a subject proof in the registry')
    .argument('<subjectDir>', 'Subject directory holding proof.json')
    .action(
      guarded(async (subjectDir: string) => {
        const outcome = await (await orchestrator()).registerSubject(abs(subjectDir));
        if (outcome.entry) {
          if (globals().json) {
            json(outcome.entry);
          } else {
            ctx.stdout(`Registered ${outcome.subjectId}`);
            ctx.stdout(`  proof hash:   ${outcome.entry.proofHash}`);
            ctx.stdout(`  public input: ${outcome.entry.publicInput} (${outcome.entry.publicInputHex})`);
          }
        }
        if (outcome.error) {
          ctx.stderr(`Error: ${outcome.error.message}`);
        }
        ctx.setExitCode(outcome.exitCode);
      })
    );

  program
    .command('prepare-input')
    .description('Write the engine input file for a subject')
    .argument('<subjectDir>', 'Subject directory')
    .requiredOption('--features <json>', 'Feature vector as a JSON array')
    .option('--score <n>', 'Plaintext model score')
    .action(
      guarded(async (subjectDir: string, options: { features: string; score?: string }) => {
        const features = parseFeatures(options.features);
        const score = options.score !== undefined ? parseScore(options.score) : undefined;
        const path = await (await orchestrator()).prepareInput(abs(subjectDir), features, score);
        if (globals().json) {
          json({ path });
        } else {
          ctx.stdout(`Wrote ${path}`);
        }
      })
    );

  program
    .command('doctor')
    .description('Check the proving engine and configuration')
    .action(
      guarded(async () => {
        const report = await (await orchestrator()).doctor();
        if (globals().json) {
          json({ checks: report.checks });
        } else {
          ctx.stdout('zkscore doctor');
          ctx.stdout('==============');
          for (const check of report.checks) {
            ctx.stdout(`[${check.status}] ${check.name}: ${check.message}`);
          }
          ctx.stdout(report.success ? 'All checks passed!' : 'Some checks failed. Please fix the issues above.');
        }
        ctx.setExitCode(report.exitCode);
      })
    );

  return program;
}
