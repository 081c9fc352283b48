import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { InvalidScopeError } from '@zkscore/errors';
import {
  ArtifactStore,
  subjectKey,
  buildSubjectInput,
  readJsonArtifact,
  writeJsonArtifact,
  plaintextScoreOf,
  MetadataSchema,
  SubjectInputSchema,
} from './index.js';

describe('ArtifactStore.resolve', () => {
  const store = new ArtifactStore({ sharedRoot: '/work/shared', subjectRoot: '/work/proofs' });

  it('should place shared artifacts under the shared root', () => {
    expect(store.resolve('shared', 'compiledCircuit').path).toBe('/work/shared/model.compiled');
    expect(store.resolve('shared', 'provingKey').path).toBe('/work/shared/pk.key');
    expect(store.resolve('shared', 'referenceString').path).toBe('/work/shared/kzg.srs');
  });

  it('should place subject artifacts under the subject directory', () => {
    const location = store.resolve('subject', 'proof', 'alice');

    expect(location).toEqual({
      scope: 'subject',
      name: 'proof',
      subjectId: 'alice',
      path: '/work/proofs/alice/proof.json',
    });
    expect(store.resolve('subject', 'calldata', 'alice').path).toBe('/work/proofs/alice/contract/calldata.json');
  });

  it('should keep the 0x prefix of address subject ids', () => {
    const location = store.resolve('subject', 'input', '0x4444444444444444444444444444444444444444');

    expect(location.path).toBe('/work/proofs/0x4444444444444444444444444444444444444444/input.json');
  });

  it('should use the directory it was handed as the subject scope', () => {
    const { store: scoped, subjectId } = ArtifactStore.forSubjectDirectory(
      { sharedRoot: '/work/shared', subjectRoot: '/elsewhere' },
      '/work/proofs/0xabc123'
    );

    expect(subjectId).toBe('0xabc123');
    expect(scoped.resolve('subject', 'input', subjectId).path).toBe('/work/proofs/0xabc123/input.json');
  });

  it('should use the configured reference string path', () => {
    const custom = new ArtifactStore({
      sharedRoot: '/work/shared',
      subjectRoot: '/work/proofs',
      referenceStringPath: '/cache/kzg17.srs',
    });

    expect(custom.resolve('shared', 'referenceString').path).toBe('/cache/kzg17.srs');
    expect(custom.resolve('shared', 'settings').path).toBe('/work/shared/settings.json');
  });

  it('should fail with InvalidScope when a subject id is missing', () => {
    expect(() => store.resolve('subject', 'witness')).toThrow(InvalidScopeError);
    expect(() => store.resolve('subject', 'witness', '')).toThrow('requires a subject id');
  });

  it('should reject names that do not belong to the scope', () => {
    expect(() => store.resolve('shared', 'proof')).toThrow('"proof" is not a shared artifact');
    expect(() => store.resolve('subject', 'provingKey', 'alice')).toThrow('"provingKey" is not a subject artifact');
    expect(() => store.resolve('shared', 'toString')).toThrow(InvalidScopeError);
  });

  it('should reject subject ids that would escape the subject root', () => {
    expect(() => store.resolve('subject', 'proof', '../shared')).toThrow(InvalidScopeError);
    expect(() => store.resolve('subject', 'proof', 'a/b')).toThrow(InvalidScopeError);
  });
});

describe('subjectKey', () => {
  it('should keep plain ids and drop the address prefix', () => {
    expect(subjectKey('subject-01')).toBe('subject-01');
    expect(subjectKey('0xABCDEF')).toBe('ABCDEF');
    expect(() => subjectKey('0x../up')).toThrow(InvalidScopeError);
  });
});

describe('ArtifactStore on disk', () => {
  let root: string;
  let store: ArtifactStore;

  beforeEach(async () => {
    root = join(tmpdir(), `zkscore-artifacts-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(root, { recursive: true });
    store = new ArtifactStore({ sharedRoot: join(root, 'shared'), subjectRoot: join(root, 'proofs') });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should report existence of files only', async () => {
    const location = store.resolve('subject', 'proof', 'alice');
    expect(await store.exists(location)).toBe(false);

    await store.ensureDirectory(location);
    expect(await store.exists(location)).toBe(false);

    await writeFile(location.path, '{}');
    expect(await store.exists(location)).toBe(true);
  });

  it('should create parent directories idempotently', async () => {
    const location = store.resolve('subject', 'verifierContract', 'alice');

    await store.ensureDirectory(location);
    await store.ensureDirectory(location);

    const info = await stat(join(root, 'proofs', 'alice', 'contract'));
    expect(info.isDirectory()).toBe(true);
  });

  it('should list missing shared artifacts in a fixed order', async () => {
    expect(await store.missingShared()).toEqual([
      'compiledCircuit',
      'settings',
      'provingKey',
      'verificationKey',
      'referenceString',
    ]);

    await mkdir(join(root, 'shared'), { recursive: true });
    await writeFile(join(root, 'shared', 'model.compiled'), 'circuit');
    await writeFile(join(root, 'shared', 'pk.key'), 'pk');

    expect(await store.missingShared()).toEqual(['settings', 'verificationKey', 'referenceString']);
  });

  it('should derive the subject root from a subject directory', () => {
    const { store: scoped, subjectId } = ArtifactStore.forSubjectDirectory(
      { sharedRoot: '/work/shared', subjectRoot: '/ignored' },
      '/data/runs/bob'
    );

    expect(subjectId).toBe('bob');
    expect(scoped.resolve('subject', 'witness', subjectId).path).toBe('/data/runs/bob/witness.json');
  });

  it('should round-trip a subject input through the schema', async () => {
    const location = store.resolve('subject', 'input', 'alice');
    await writeJsonArtifact(location, buildSubjectInput([0.5, 0.8, 0.6, 0.7], 0.63));

    const input = await readJsonArtifact(location, SubjectInputSchema);

    expect(input.input_data).toEqual([[0.5, 0.8, 0.6, 0.7]]);
    expect(input.input_shapes).toEqual([[4]]);
    expect(plaintextScoreOf(input)).toBe(0.63);
    expect(await readFile(location.path, 'utf8')).toMatch(/\n$/);
  });

  it('should reject metadata whose score fields are not numbers', async () => {
    const location = store.resolve('subject', 'metadata', 'alice');
    await writeJsonArtifact(location, { scaled_score: 'lots' });

    await expect(readJsonArtifact(location, MetadataSchema)).rejects.toThrow();
  });
});

describe('buildSubjectInput', () => {
  it('should omit output_data when no score is given', () => {
    const input = buildSubjectInput([1, 2]);

    expect(input).toEqual({ input_data: [[1, 2]], input_shapes: [[2]] });
    expect(plaintextScoreOf(input)).toBeUndefined();
  });

  it('should reject empty or non-finite features', () => {
    expect(() => buildSubjectInput([])).toThrow('must not be empty');
    expect(() => buildSubjectInput([1, Number.NaN])).toThrow('finite');
  });
});
