import { z } from 'zod';
import { ArtifactStore, writeSubjectInput } from '@zkscore/artifacts';
import { CommonCircuitBuilder, type CommonBuildResult } from '@zkscore/circuit';
import type { Logger, PipelineConfig } from '@zkscore/config';
import {
  MissingSharedArtifactsError,
  MissingSubjectInputError,
  StageFailedError,
  UsageError,
  VerificationFailedError,
  describeError,
  isPipelineError,
  type PipelineError,
} from '@zkscore/errors';
import { ProofPipeline, type PipelineRunResult } from '@zkscore/pipeline';
import { ExternalProverClient, spawnRunner, type CommandRunner } from '@zkscore/prover-client';
import { ProofRegistry, type RegistryEntry } from '@zkscore/registry';

export const InvocationSchema = z
  .object({
    modelPath: z.string().min(1).optional(),
    referenceStringPath: z.string().min(1).optional(),
    calibrationInput: z.string().min(1).optional(),
    subjectDirs: z.array(z.string().min(1)).default([]),
    generateContract: z.boolean().default(false),
    register: z.boolean().default(false),
    concurrency: z.number().int().positive().default(1),
  })
  .superRefine((invocation, ctx) => {
    const setup = invocation.modelPath !== undefined || invocation.referenceStringPath !== undefined;
    if (setup) {
      if (invocation.modelPath === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['modelPath'], message: 'common setup needs a model path' });
      }
      if (invocation.referenceStringPath === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['referenceStringPath'],
          message: 'common setup needs a reference string path',
        });
      }
      if (invocation.subjectDirs.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['subjectDirs'],
          message: 'common setup does not take subject directories',
        });
      }
    } else if (invocation.subjectDirs.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['subjectDirs'],
        message: 'at least one subject directory is required',
      });
    }
  });

export type Invocation = z.input<typeof InvocationSchema>;

interface Outcome {
  success: boolean;
  exitCode: 0 | 1;
}

export interface SetupOutcome extends Outcome {
  mode: 'setup';
  build: CommonBuildResult;
}

export interface SubjectOutcome {
  subjectDir: string;
  success: boolean;
  run: PipelineRunResult;
  registry?: RegistryEntry;
  error?: PipelineError;
}

export interface GenerateOutcome extends Outcome {
  mode: 'generate';
  subjects: SubjectOutcome[];
}

export type DispatchOutcome = SetupOutcome | GenerateOutcome;

export interface VerifyOutcome extends Outcome {
  subjectId: string;
  verified: boolean;
  detail: string;
  error?: PipelineError;
}

export interface RegisterOutcome extends Outcome {
  subjectId: string;
  entry?: RegistryEntry;
  error?: PipelineError;
}

export type CheckStatus = 'PASS' | 'WARN' | 'FAIL';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
}

export interface DoctorReport extends Outcome {
  checks: DoctorCheck[];
}

export interface OrchestratorOptions {
  runner?: CommandRunner;
  logger?: Logger;
  now?: () => Date;
}

function exitCodeOf(success: boolean): 0 | 1 {
  return success ? 0 : 1;
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight. Results keep
 * the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const queue = items.map((item, index) => ({ item, index }));
  const results = new Array<R>(items.length);

  const worker = async (): Promise<void> => {
    for (let task = queue.shift(); task !== undefined; task = queue.shift()) {
      results[task.index] = await fn(task.item, task.index);
    }
  };

  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker));
  return results;
}

/**
 * Entry point for every operation. Picks common setup or per-subject proof
 * generation from what the invocation carries.
 */
export class PipelineOrchestrator {
  private readonly client: ExternalProverClient;
  private readonly logger: Logger;

  constructor(
    private readonly config: PipelineConfig,
    private readonly options: OrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? console;
    this.client = new ExternalProverClient(config.engine, options.runner ?? spawnRunner, this.logger);
  }

  async dispatch(invocation: Invocation): Promise<DispatchOutcome> {
    const parsed = InvocationSchema.safeParse(invocation);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message);
      throw new UsageError(`Invalid invocation: ${issues.join('; ')}`);
    }
    const request = parsed.data;

    if (request.modelPath !== undefined && request.referenceStringPath !== undefined) {
      return this.setupCommon(request.modelPath, request.referenceStringPath, request.calibrationInput);
    }
    return this.generate(request.subjectDirs, {
      generateContract: request.generateContract,
      register: request.register,
      concurrency: request.concurrency,
    });
  }

  private async setupCommon(modelPath: string, referenceStringPath: string, calibrationInput?: string): Promise<SetupOutcome> {
    const store = new ArtifactStore({ ...this.config, referenceStringPath });
    const builder = new CommonCircuitBuilder(store, this.client, this.logger);

    this.logger.info(`[zkscore] common setup in ${store.sharedRoot}`);
    const build = await builder.build({ modelPath, ...(calibrationInput !== undefined && { calibrationInput }) });
    if (build.success) {
      this.logger.info('[zkscore] common setup complete');
    }
    return { mode: 'setup', success: build.success, exitCode: exitCodeOf(build.success), build };
  }

  private async generate(
    subjectDirs: readonly string[],
    options: { generateContract: boolean; register: boolean; concurrency: number }
  ): Promise<GenerateOutcome> {
    const subjects = await mapWithConcurrency(subjectDirs, options.concurrency, (subjectDir) =>
      this.generateOne(subjectDir, options)
    );
    const success = subjects.every((subject) => subject.success);
    const passed = subjects.filter((subject) => subject.success).length;
    this.logger.info(`[zkscore] ${passed}/${subjects.length} subject(s) proven`);
    return { mode: 'generate', success, exitCode: exitCodeOf(success), subjects };
  }

  private async generateOne(
    subjectDir: string,
    options: { generateContract: boolean; register: boolean }
  ): Promise<SubjectOutcome> {
    const { store, subjectId } = ArtifactStore.forSubjectDirectory(this.config, subjectDir);
    const pipeline = new ProofPipeline(store, this.client, this.config.scoring, this.logger);

    const run = await pipeline.run(subjectId, { generateContract: options.generateContract });
    if (!run.success || !options.register) {
      return { subjectDir, success: run.success, run, ...(run.error && { error: run.error }) };
    }

    try {
      const registry = await this.registryFor(store).registerProof(subjectId);
      return { subjectDir, success: true, run, registry };
    } catch (error) {
      const failure = toPipelineError('register', error);
      this.logger.error(`[zkscore] ${subjectId}: ${failure.message}`);
      return { subjectDir, success: false, run, error: failure };
    }
  }

  /**
   * Checks an existing proof using only the files in the subject directory
   * and the reference string.
   */
  async verifySubject(subjectDir: string): Promise<VerifyOutcome> {
    const { store, subjectId } = ArtifactStore.forSubjectDirectory(this.config, subjectDir);
    const failed = (error: PipelineError): VerifyOutcome => {
      this.logger.error(`[zkscore] ${subjectId}: ${error.message}`);
      return { subjectId, success: false, exitCode: 1, verified: false, detail: error.message, error };
    };

    const proof = store.resolve('subject', 'proof', subjectId);
    const verificationKey = store.resolve('subject', 'verificationKey', subjectId);
    const settings = store.resolve('subject', 'settings', subjectId);
    const referenceString = store.resolve('shared', 'referenceString');

    for (const location of [proof, verificationKey, settings]) {
      if (!(await store.exists(location))) {
        return failed(new MissingSubjectInputError(location.path));
      }
    }
    if (!(await store.exists(referenceString))) {
      return failed(new MissingSharedArtifactsError(['referenceString']));
    }

    try {
      const result = await this.client.verify({
        proof: proof.path,
        verificationKey: verificationKey.path,
        referenceString: referenceString.path,
        settings: settings.path,
      });
      if (!result.verified) {
        return failed(new VerificationFailedError(proof.path, result.detail));
      }
      this.logger.info(`[zkscore] ${subjectId}: proof verified`);
      return { subjectId, success: true, exitCode: 0, verified: true, detail: result.detail };
    } catch (error) {
      return failed(toPipelineError('verify', error));
    }
  }

  async registerSubject(subjectDir: string): Promise<RegisterOutcome> {
    const { store, subjectId } = ArtifactStore.forSubjectDirectory(this.config, subjectDir);
    try {
      const entry = await this.registryFor(store).registerProof(subjectId);
      return { subjectId, success: true, exitCode: 0, entry };
    } catch (error) {
      const failure = toPipelineError('register', error);
      this.logger.error(`[zkscore] ${subjectId}: ${failure.message}`);
      return { subjectId, success: false, exitCode: 1, error: failure };
    }
  }

  /** Writes the subject's engine input file and returns its path. */
  async prepareInput(subjectDir: string, features: readonly number[], score?: number): Promise<string> {
    const { store, subjectId } = ArtifactStore.forSubjectDirectory(this.config, subjectDir);
    if (score !== undefined && !Number.isFinite(score)) {
      throw new UsageError(`Score must be a finite number, got ${score}`);
    }
    try {
      const location = await writeSubjectInput(store, subjectId, features, score);
      this.logger.info(`[zkscore] ${subjectId}: wrote ${location.path}`);
      return location.path;
    } catch (error) {
      if (isPipelineError(error)) throw error;
      throw new UsageError(describeError(error));
    }
  }

  async doctor(): Promise<DoctorReport> {
    const checks: DoctorCheck[] = [];

    try {
      const version = await this.client.version();
      checks.push({ name: 'Proving engine', status: 'PASS', message: `${this.config.engine.command}: ${version}` });
    } catch (error) {
      checks.push({ name: 'Proving engine', status: 'FAIL', message: describeError(error) });
    }

    const store = new ArtifactStore(this.config);
    const missing = await store.missingShared();
    if (missing.length === 0) {
      checks.push({ name: 'Shared artifacts', status: 'PASS', message: store.sharedRoot });
    } else {
      checks.push({
        name: 'Shared artifacts',
        status: 'WARN',
        message: `missing ${missing.join(', ')} (run "zkscore setup-common")`,
      });
    }

    checks.push({
      name: 'Configuration',
      status: 'PASS',
      message: `shared ${this.config.sharedRoot}, subjects ${this.config.subjectRoot}, registry ${this.config.registryRoot}`,
    });

    const success = !checks.some((check) => check.status === 'FAIL');
    return { success, exitCode: exitCodeOf(success), checks };
  }

  private registryFor(store: ArtifactStore): ProofRegistry {
    return new ProofRegistry(store, this.config, this.logger, this.options.now);
  }
}

function toPipelineError(stage: string, error: unknown): PipelineError {
  return isPipelineError(error) ? error : new StageFailedError(stage, error);
}
