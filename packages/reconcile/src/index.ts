import {
  MetadataSchema,
  SubjectInputSchema,
  plaintextScoreOf,
  readJsonArtifact,
  type ArtifactStore,
  type Metadata,
} from '@zkscore/artifacts';
import type { ScoringConfig } from '@zkscore/config';

/**
 * How a scaled score was read: `score-range` is the upstream writer's
 * `int(score * scoreRange)`, `field` is the value committed in the proof
 * (`score * scoreRange * scaleDenominator`).
 */
export type ScaledScoreEncoding = 'score-range' | 'field';

export interface ScoreComparison {
  kind: 'compared';
  plaintextScore: number;
  scaledScore: number;
  encoding: ScaledScoreEncoding;
  normalizedScore: number;
  delta: number;
  discrepancy: boolean;
}

/** Not an error: there was nothing to compare. */
export interface ReconciliationSkipped {
  kind: 'skipped';
  reason: string;
}

export type ReconciliationOutcome = ScoreComparison | ReconciliationSkipped;

// A field-encoded score at or below scoreRange would be under 1 / scaleDenominator.
export function scaledScoreEncoding(scaledScore: number, scoring: ScoringConfig): ScaledScoreEncoding {
  return Math.abs(scaledScore) <= scoring.scoreRange ? 'score-range' : 'field';
}

export function normalizeScaledScore(scaledScore: number, scoring: ScoringConfig): number {
  return scaledScoreEncoding(scaledScore, scoring) === 'score-range'
    ? scaledScore / scoring.scoreRange
    : scaledScore / scoring.scaleDenominator / scoring.scoreRange;
}

export function reconcile(plaintextScore: number, metadata: Metadata, scoring: ScoringConfig): ReconciliationOutcome {
  const scaledScore = metadata.scaled_score;
  if (scaledScore === undefined) {
    return { kind: 'skipped', reason: 'metadata has no scaled_score' };
  }

  const encoding = scaledScoreEncoding(scaledScore, scoring);
  const normalizedScore = normalizeScaledScore(scaledScore, scoring);
  const delta = Math.abs(normalizedScore - plaintextScore);
  return {
    kind: 'compared',
    plaintextScore,
    scaledScore,
    encoding,
    normalizedScore,
    delta,
    discrepancy: delta > scoring.tolerance,
  };
}

/**
 * Reconcile from the subject's files. The plaintext score is the metadata's
 * `score`, falling back to the input's output slot. Never throws: anything
 * unreadable turns into a skip with the reason.
 */
export async function reconcileSubject(
  store: ArtifactStore,
  subjectId: string,
  scoring: ScoringConfig
): Promise<ReconciliationOutcome> {
  const metadataLocation = store.resolve('subject', 'metadata', subjectId);
  if (!(await store.exists(metadataLocation))) {
    return { kind: 'skipped', reason: 'no metadata.json for subject' };
  }

  let metadata: Metadata;
  try {
    metadata = await readJsonArtifact(metadataLocation, MetadataSchema);
  } catch (error) {
    return { kind: 'skipped', reason: `unreadable metadata.json: ${(error as Error).message}` };
  }

  if (metadata.scaled_score === undefined) {
    return { kind: 'skipped', reason: 'metadata has no scaled_score' };
  }

  let plaintextScore = metadata.score;
  if (plaintextScore === undefined) {
    try {
      const input = await readJsonArtifact(store.resolve('subject', 'input', subjectId), SubjectInputSchema);
      plaintextScore = plaintextScoreOf(input);
    } catch (error) {
      return { kind: 'skipped', reason: `no score in metadata and unreadable input.json: ${(error as Error).message}` };
    }
  }
  if (plaintextScore === undefined) {
    return { kind: 'skipped', reason: 'no plaintext score in metadata or input' };
  }

  return reconcile(plaintextScore, metadata, scoring);
}

/**
 * Proof instances are field elements written as little-endian hex.
 */
export function decodeFieldElement(hex: string): bigint {
  const digits = hex.replace(/^0x/i, '');
  if (digits.length === 0 || digits.length % 2 !== 0 || !/^[0-9a-f]+$/i.test(digits)) {
    throw new Error(`Not a little-endian hex field element: "${hex}"`);
  }
  const bytes = digits.match(/../g) ?? [];
  return BigInt(`0x${bytes.reverse().join('')}`);
}

export function formatOutcome(outcome: ReconciliationOutcome): string {
  if (outcome.kind === 'skipped') {
    return `score reconciliation skipped: ${outcome.reason}`;
  }
  const verdict = outcome.discrepancy ? 'DISCREPANCY' : 'ok';
  return (
    `score reconciliation ${verdict}: plaintext ${outcome.plaintextScore}, ` +
    `proof ${outcome.normalizedScore.toFixed(4)} (scaled ${outcome.scaledScore}), delta ${outcome.delta.toFixed(4)}`
  );
}
