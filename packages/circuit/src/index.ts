import { stat } from 'node:fs/promises';
import type { ArtifactStore, Location } from '@zkscore/artifacts';
import { MissingModelError, StageFailedError, isPipelineError, type PipelineError } from '@zkscore/errors';
import type { Logger } from '@zkscore/config';
import type { ExternalProverClient } from '@zkscore/prover-client';

/**
 * Progress of the common phase, derived from which shared files exist.
 * The reference string comes before the keys because setup consumes it.
 */
export type CircuitBuildState = 'start' | 'circuit-compiled' | 'reference-string-ready' | 'done';

export type CircuitStep = 'compile-circuit' | 'reference-string' | 'setup';

export interface CircuitStepResult {
  step: CircuitStep;
  outcome: 'ran' | 'skipped';
  artifacts: string[];
  message: string;
}

export interface CommonBuildOptions {
  modelPath: string;
  /** Sample input for calibrate-settings; calibration is skipped without one. */
  calibrationInput?: string;
}

export interface CommonBuildResult {
  success: boolean;
  state: CircuitBuildState;
  steps: CircuitStepResult[];
  failedStep?: CircuitStep;
  error?: PipelineError;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export class CommonCircuitBuilder {
  constructor(
    private readonly store: ArtifactStore,
    private readonly client: ExternalProverClient,
    private readonly logger: Logger = console
  ) {}

  async currentState(): Promise<CircuitBuildState> {
    const shared = this.store.sharedLocations();
    const has = (location: Location) => this.store.exists(location);

    if (!((await has(shared.compiledCircuit)) && (await has(shared.settings)))) return 'start';
    if (!(await has(shared.referenceString))) return 'circuit-compiled';
    if (!((await has(shared.provingKey)) && (await has(shared.verificationKey)))) return 'reference-string-ready';
    return 'done';
  }

  /**
   * Bring the shared artifacts to `done`, running only the steps whose
   * outputs are absent. Stops at the first failure; whatever the engine
   * already wrote stays on disk.
   */
  async build(options: CommonBuildOptions): Promise<CommonBuildResult> {
    const shared = this.store.sharedLocations();
    const steps: CircuitStepResult[] = [];
    let state: CircuitBuildState = 'start';

    const attempt = async (step: CircuitStep, run: () => Promise<CircuitStepResult>): Promise<PipelineError | undefined> => {
      try {
        const result = await run();
        steps.push(result);
        this.logger.info(`[zkscore] ${step}: ${result.message}`);
        return undefined;
      } catch (error) {
        const failure = isPipelineError(error) ? error : new StageFailedError(step, error);
        this.logger.error(`[zkscore] ${step} failed: ${failure.message}`);
        return failure;
      }
    };

    const fail = (step: CircuitStep, error: PipelineError): CommonBuildResult => ({
      success: false,
      state,
      steps,
      failedStep: step,
      error,
    });

    let error = await attempt('compile-circuit', async () => {
      if ((await this.store.exists(shared.compiledCircuit)) && (await this.store.exists(shared.settings))) {
        return skipped('compile-circuit', 'compiled circuit and settings already present');
      }
      if (!(await fileExists(options.modelPath))) {
        throw new MissingModelError(options.modelPath);
      }

      await this.store.ensureDirectory(shared.compiledCircuit);
      await this.client.generateSettings({ model: options.modelPath, settings: shared.settings.path });
      if (options.calibrationInput) {
        await this.client.calibrateSettings({
          model: options.modelPath,
          calibrationInput: options.calibrationInput,
          settings: shared.settings.path,
        });
      }
      await this.client.compileCircuit({
        model: options.modelPath,
        settings: shared.settings.path,
        compiledCircuit: shared.compiledCircuit.path,
      });
      return ran('compile-circuit', [shared.settings.path, shared.compiledCircuit.path], 'circuit compiled');
    });
    if (error) return fail('compile-circuit', error);
    state = 'circuit-compiled';

    error = await attempt('reference-string', async () => {
      if (await this.store.exists(shared.referenceString)) {
        return skipped('reference-string', `using cached ${shared.referenceString.path}`);
      }
      this.logger.info('[zkscore] downloading reference string, this may take a while');
      await this.store.ensureDirectory(shared.referenceString);
      await this.client.downloadReferenceString({
        settings: shared.settings.path,
        referenceString: shared.referenceString.path,
      });
      return ran('reference-string', [shared.referenceString.path], 'reference string downloaded');
    });
    if (error) return fail('reference-string', error);
    state = 'reference-string-ready';

    error = await attempt('setup', async () => {
      if ((await this.store.exists(shared.provingKey)) && (await this.store.exists(shared.verificationKey))) {
        return skipped('setup', 'proving and verification keys already present');
      }
      await this.client.runSetup({
        compiledCircuit: shared.compiledCircuit.path,
        referenceString: shared.referenceString.path,
        provingKey: shared.provingKey.path,
        verificationKey: shared.verificationKey.path,
      });
      return ran('setup', [shared.provingKey.path, shared.verificationKey.path], 'keys generated');
    });
    if (error) return fail('setup', error);
    state = 'done';

    return { success: true, state, steps };
  }
}

function ran(step: CircuitStep, artifacts: string[], message: string): CircuitStepResult {
  return { step, outcome: 'ran', artifacts, message };
}

function skipped(step: CircuitStep, message: string): CircuitStepResult {
  return { step, outcome: 'skipped', artifacts: [], message };
}
