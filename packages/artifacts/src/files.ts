import { z } from 'zod';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ArtifactStore, Location } from './index.js';

// Engine input format. output_data[0][0] carries the plaintext score when known.
export const SubjectInputSchema = z
  .object({
    input_data: z.array(z.array(z.number())).min(1),
    input_shapes: z.array(z.array(z.number().int())).optional(),
    output_data: z.array(z.array(z.number())).optional(),
  })
  .passthrough();

export type SubjectInput = z.infer<typeof SubjectInputSchema>;

// Written upstream alongside input.json; only score fields matter here.
export const MetadataSchema = z
  .object({
    address: z.string().optional(),
    features: z.array(z.number()).optional(),
    score: z.number().optional(),
    scaled_score: z.number().optional(),
    timestamp: z.number().optional(),
    model_version: z.string().optional(),
  })
  .passthrough();

export type Metadata = z.infer<typeof MetadataSchema>;

export const ProofFileSchema = z
  .object({
    instances: z.array(z.array(z.string())).optional(),
  })
  .passthrough();

export type ProofFile = z.infer<typeof ProofFileSchema>;

export async function readJsonArtifact<T extends z.ZodTypeAny>(location: Location, schema: T): Promise<z.infer<T>> {
  const content = await readFile(location.path, 'utf8');
  return schema.parse(JSON.parse(content));
}

export async function writeJsonArtifact(location: Location, value: unknown): Promise<void> {
  await mkdir(dirname(location.path), { recursive: true });
  await writeFile(location.path, JSON.stringify(value, null, 2) + '\n');
}

export function plaintextScoreOf(input: SubjectInput): number | undefined {
  return input.output_data?.[0]?.[0];
}

/**
 * Build the engine input for one feature vector. output_data is left out
 * when no plaintext score is known.
 */
export function buildSubjectInput(features: readonly number[], score?: number): SubjectInput {
  if (features.length === 0) {
    throw new Error('Feature vector must not be empty');
  }
  if (features.some((f) => !Number.isFinite(f))) {
    throw new Error('Feature vector must contain only finite numbers');
  }
  return {
    input_data: [[...features]],
    input_shapes: [[features.length]],
    ...(score !== undefined && { output_data: [[score]] }),
  };
}

export async function writeSubjectInput(
  store: ArtifactStore,
  subjectId: string,
  features: readonly number[],
  score?: number
): Promise<Location> {
  const location = store.resolve('subject', 'input', subjectId);
  await writeJsonArtifact(location, buildSubjectInput(features, score));
  return location;
}
