import { copyFile } from 'node:fs/promises';
import type { ArtifactStore } from '@zkscore/artifacts';
import type { Logger, ScoringConfig } from '@zkscore/config';
import {
  MissingSharedArtifactsError,
  MissingSubjectInputError,
  StageFailedError,
  VerificationFailedError,
  isPipelineError,
  type PipelineError,
} from '@zkscore/errors';
import type { ExternalProverClient } from '@zkscore/prover-client';
import { formatOutcome, reconcileSubject, type ReconciliationOutcome } from '@zkscore/reconcile';

export type PipelineStage =
  | 'generate-witness'
  | 'prove'
  | 'stage-artifacts'
  | 'verify'
  | 'create-verifier'
  | 'encode-calldata';

export interface PipelineStageResult {
  stage: PipelineStage;
  status: 'success' | 'failed';
  message: string;
  artifacts: string[];
  durationMs: number;
}

export interface PipelineRunOptions {
  /** Also emit the on-chain verifier and calldata. */
  generateContract?: boolean;
}

export interface PipelineRunResult {
  subjectId: string;
  success: boolean;
  stages: PipelineStageResult[];
  reconciliation?: ReconciliationOutcome;
  error?: PipelineError;
}

interface StageOutput {
  artifacts: string[];
  message: string;
}

/**
 * Produces and verifies one subject's proof against the shared circuit.
 * Stages run strictly in order and the run stops at the first failure.
 */
export class ProofPipeline {
  constructor(
    private readonly store: ArtifactStore,
    private readonly client: ExternalProverClient,
    private readonly scoring: ScoringConfig,
    private readonly logger: Logger = console
  ) {}

  async run(subjectId: string, options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
    const stages: PipelineStageResult[] = [];

    const precondition = await this.checkPreconditions(subjectId);
    if (precondition) {
      this.logger.error(`[zkscore] ${subjectId}: ${precondition.message}`);
      return { subjectId, success: false, stages, error: precondition };
    }

    const shared = this.store.sharedLocations();
    const input = this.store.resolve('subject', 'input', subjectId);
    const witness = this.store.resolve('subject', 'witness', subjectId);
    const proof = this.store.resolve('subject', 'proof', subjectId);
    const vkCopy = this.store.resolve('subject', 'verificationKey', subjectId);
    const settingsCopy = this.store.resolve('subject', 'settings', subjectId);

    const runStage = async (stage: PipelineStage, body: () => Promise<StageOutput>): Promise<PipelineError | undefined> => {
      const started = Date.now();
      this.logger.info(`[zkscore] ${subjectId}: ${stage} started`);
      try {
        const output = await body();
        stages.push({ stage, status: 'success', ...output, durationMs: Date.now() - started });
        this.logger.info(`[zkscore] ${subjectId}: ${stage} ${output.message}`);
        return undefined;
      } catch (error) {
        const failure = isPipelineError(error) ? error : new StageFailedError(stage, error);
        stages.push({ stage, status: 'failed', message: failure.message, artifacts: [], durationMs: Date.now() - started });
        this.logger.error(`[zkscore] ${subjectId}: ${stage} failed: ${failure.message}`);
        return failure;
      }
    };

    const fail = (error: PipelineError, reconciliation?: ReconciliationOutcome): PipelineRunResult => ({
      subjectId,
      success: false,
      stages,
      ...(reconciliation && { reconciliation }),
      error,
    });

    let error = await runStage('generate-witness', async () => {
      const output = await this.client.generateWitness({
        input: input.path,
        compiledCircuit: shared.compiledCircuit.path,
        witness: witness.path,
      });
      return { artifacts: output.artifacts, message: 'witness generated' };
    });
    if (error) return fail(error);

    error = await runStage('prove', async () => {
      const output = await this.client.prove({
        witness: witness.path,
        provingKey: shared.provingKey.path,
        compiledCircuit: shared.compiledCircuit.path,
        referenceString: shared.referenceString.path,
        proof: proof.path,
      });
      return { artifacts: output.artifacts, message: 'proof generated' };
    });
    if (error) return fail(error);

    error = await runStage('stage-artifacts', async () => {
      await this.store.ensureDirectory(vkCopy);
      await copyFile(shared.verificationKey.path, vkCopy.path);
      await copyFile(shared.settings.path, settingsCopy.path);
      return { artifacts: [vkCopy.path, settingsCopy.path], message: 'verification key and settings copied' };
    });
    if (error) return fail(error);

    error = await runStage('verify', async () => {
      const result = await this.client.verify({
        proof: proof.path,
        verificationKey: vkCopy.path,
        referenceString: shared.referenceString.path,
        settings: settingsCopy.path,
      });
      if (!result.verified) {
        throw new VerificationFailedError(proof.path, result.detail);
      }
      return { artifacts: [], message: 'proof verified' };
    });
    if (error) {
      // The proof stays on disk, so the score can still be reported.
      return fail(error, await this.reconcile(subjectId));
    }

    if (options.generateContract) {
      const contract = this.store.resolve('subject', 'verifierContract', subjectId);
      const calldata = this.store.resolve('subject', 'calldata', subjectId);

      error = await runStage('create-verifier', async () => {
        const output = await this.client.createEvmVerifier({
          settings: settingsCopy.path,
          verificationKey: vkCopy.path,
          referenceString: shared.referenceString.path,
          contract: contract.path,
        });
        return { artifacts: output.artifacts, message: 'verifier contract written' };
      });
      if (error) return fail(error);

      error = await runStage('encode-calldata', async () => {
        const output = await this.client.encodeCalldata({ proof: proof.path, calldata: calldata.path });
        return { artifacts: output.artifacts, message: 'calldata encoded' };
      });
      if (error) return fail(error);
    }

    return { subjectId, success: true, stages, reconciliation: await this.reconcile(subjectId) };
  }

  private async checkPreconditions(subjectId: string): Promise<PipelineError | undefined> {
    try {
      // Rejects subject ids that cannot name a directory.
      this.store.subjectDirectory(subjectId);
    } catch (error) {
      if (isPipelineError(error)) return error;
      throw error;
    }
    const missing = await this.store.missingShared();
    if (missing.length > 0) {
      return new MissingSharedArtifactsError(missing);
    }
    const input = this.store.resolve('subject', 'input', subjectId);
    if (!(await this.store.exists(input))) {
      return new MissingSubjectInputError(input.path);
    }
    return undefined;
  }

  private async reconcile(subjectId: string): Promise<ReconciliationOutcome> {
    const outcome = await reconcileSubject(this.store, subjectId, this.scoring);
    const line = `[zkscore] ${subjectId}: ${formatOutcome(outcome)}`;
    if (outcome.kind === 'compared' && outcome.discrepancy) {
      this.logger.warn(line);
    } else {
      this.logger.info(line);
    }
    return outcome;
  }
}
