import { createHash } from 'node:crypto';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  MetadataSchema,
  ProofFileSchema,
  readJsonArtifact,
  subjectKey,
  writeJsonArtifact,
  type ArtifactStore,
  type Metadata,
} from '@zkscore/artifacts';
import type { Logger, PipelineConfig } from '@zkscore/config';
import { StageFailedError, isPipelineError } from '@zkscore/errors';
import { decodeFieldElement } from '@zkscore/reconcile';

export const RegistryEntrySchema = z.object({
  subjectId: z.string(),
  proofHash: z.string().regex(/^[0-9a-f]{64}$/),
  publicInput: z.string().regex(/^\d+$/), // decimal; may exceed Number.MAX_SAFE_INTEGER
  publicInputHex: z.string().regex(/^0x[0-9a-f]+$/),
  originalScore: z.number().optional(),
  scaledScore: z.number().optional(),
  scalingFactor: z.number().optional(),
  modelVersion: z.string(),
  createdAt: z.string(), // ISO date string
});

export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;

export type RegistryConfig = Pick<PipelineConfig, 'registryRoot' | 'modelVersion'>;

/**
 * Records proven scores by subject: one entry per subject under the registry
 * root, plus a lookup.json in the subject's own directory.
 */
export class ProofRegistry {
  constructor(
    private readonly store: ArtifactStore,
    private readonly config: RegistryConfig,
    private readonly logger: Logger = console,
    private readonly now: () => Date = () => new Date()
  ) {}

  entryPath(subjectId: string): string {
    return join(this.config.registryRoot, `${subjectKey(subjectId)}.json`);
  }

  async registerProof(subjectId: string): Promise<RegistryEntry> {
    try {
      return await this.register(subjectId);
    } catch (error) {
      throw isPipelineError(error) ? error : new StageFailedError('register', error);
    }
  }

  /** Returns undefined when the subject has never been registered. */
  async readEntry(subjectId: string): Promise<RegistryEntry | undefined> {
    let content: string;
    try {
      content = await readFile(this.entryPath(subjectId), 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
    return RegistryEntrySchema.parse(JSON.parse(content));
  }

  private async register(subjectId: string): Promise<RegistryEntry> {
    const proofLocation = this.store.resolve('subject', 'proof', subjectId);
    const raw = await readFile(proofLocation.path);
    const proofHash = createHash('sha256').update(raw).digest('hex');

    const proof = ProofFileSchema.parse(JSON.parse(raw.toString('utf8')));
    const instance = proof.instances?.[0]?.[0];
    if (instance === undefined) {
      throw new Error(`${proofLocation.path} has no public instance`);
    }
    const publicInput = decodeFieldElement(instance);

    const metadata = await this.readMetadata(subjectId);
    const scaledScore = metadata.scaled_score;
    // With scaled_score on the 0-1000 range this lands near the scale denominator.
    const scalingFactor = scaledScore !== undefined && scaledScore > 0 ? Number(publicInput) / scaledScore : undefined;

    const entry: RegistryEntry = {
      subjectId,
      proofHash,
      publicInput: publicInput.toString(),
      publicInputHex: `0x${publicInput.toString(16)}`,
      ...(metadata.score !== undefined && { originalScore: metadata.score }),
      ...(scaledScore !== undefined && { scaledScore }),
      ...(scalingFactor !== undefined && { scalingFactor }),
      modelVersion: metadata.model_version ?? this.config.modelVersion,
      createdAt: this.now().toISOString(),
    };

    await mkdir(this.config.registryRoot, { recursive: true });
    await writeFile(this.entryPath(subjectId), JSON.stringify(entry, null, 2) + '\n');

    await writeJsonArtifact(this.store.resolve('subject', 'lookup', subjectId), {
      subjectId,
      ...(metadata.address !== undefined && { address: metadata.address }),
      proofHash,
      publicInput: entry.publicInput,
      publicInputHex: entry.publicInputHex,
      ...(entry.originalScore !== undefined && { originalScore: entry.originalScore }),
      ...(entry.scalingFactor !== undefined && { scalingFactor: entry.scalingFactor }),
    });

    this.logger.info(`[zkscore] ${subjectId}: registered proof ${proofHash.slice(0, 12)} (public input ${entry.publicInput})`);
    return entry;
  }

  // Metadata is optional for registration.
  private async readMetadata(subjectId: string): Promise<Metadata> {
    const location = this.store.resolve('subject', 'metadata', subjectId);
    if (!(await this.store.exists(location))) {
      return {};
    }
    return readJsonArtifact(location, MetadataSchema);
  }
}
