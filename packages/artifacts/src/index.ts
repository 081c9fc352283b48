import { stat, mkdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { InvalidScopeError } from '@zkscore/errors';
import type { PipelineConfig } from '@zkscore/config';

export * from './files.js';

export type ArtifactScope = 'shared' | 'subject';

// Logical name -> file name, relative to the scope's directory
export const ARTIFACT_LAYOUT = {
  shared: {
    compiledCircuit: 'model.compiled',
    settings: 'settings.json',
    provingKey: 'pk.key',
    verificationKey: 'vk.key',
    referenceString: 'kzg.srs',
  },
  subject: {
    input: 'input.json',
    witness: 'witness.json',
    proof: 'proof.json',
    metadata: 'metadata.json',
    verificationKey: 'vk.key',
    settings: 'settings.json',
    verifierContract: 'contract/verifier.sol',
    calldata: 'contract/calldata.json',
    lookup: 'lookup.json',
  },
} as const;

export type SharedArtifactName = keyof (typeof ARTIFACT_LAYOUT)['shared'];
export type SubjectArtifactName = keyof (typeof ARTIFACT_LAYOUT)['subject'];

export const SHARED_ARTIFACTS: readonly SharedArtifactName[] = [
  'compiledCircuit',
  'settings',
  'provingKey',
  'verificationKey',
  'referenceString',
];

export interface Location {
  scope: ArtifactScope;
  name: string;
  path: string;
  subjectId?: string;
}

export type StoreRoots = Pick<PipelineConfig, 'sharedRoot' | 'subjectRoot' | 'referenceStringPath'>;

const SUBJECT_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Subject ids name directories under the subject root and are used as given. */
export function subjectDirectoryName(subjectId: string): string {
  if (!SUBJECT_KEY_PATTERN.test(subjectId)) {
    throw new InvalidScopeError(`Subject id "${subjectId}" cannot be used as a directory name`);
  }
  return subjectId;
}

/**
 * Registry key for a subject: a leading 0x is dropped so an address and its
 * bare hex form share one registry entry.
 */
export function subjectKey(subjectId: string): string {
  return subjectDirectoryName(subjectId.replace(/^0x/i, ''));
}

/**
 * Maps logical artifact names to paths and answers presence questions.
 * Knows nothing about artifact contents.
 */
export class ArtifactStore {
  constructor(private readonly roots: StoreRoots) {}

  /** Store rooted at a subject directory's parent, for callers that are handed the directory itself. */
  static forSubjectDirectory(roots: StoreRoots, subjectDir: string): { store: ArtifactStore; subjectId: string } {
    return {
      store: new ArtifactStore({ ...roots, subjectRoot: dirname(subjectDir) }),
      subjectId: basename(subjectDir),
    };
  }

  get sharedRoot(): string {
    return this.roots.sharedRoot;
  }

  resolve(scope: 'shared', name: SharedArtifactName): Location;
  resolve(scope: 'subject', name: SubjectArtifactName, subjectId?: string): Location;
  resolve(scope: ArtifactScope, name: string, subjectId?: string): Location;
  resolve(scope: ArtifactScope, name: string, subjectId?: string): Location {
    if (scope === 'shared') {
      const file = lookup(ARTIFACT_LAYOUT.shared, name);
      if (!file) {
        throw new InvalidScopeError(`"${name}" is not a shared artifact`);
      }
      const path =
        name === 'referenceString' && this.roots.referenceStringPath
          ? this.roots.referenceStringPath
          : join(this.roots.sharedRoot, file);
      return { scope, name, path };
    }

    if (scope === 'subject') {
      const file = lookup(ARTIFACT_LAYOUT.subject, name);
      if (!file) {
        throw new InvalidScopeError(`"${name}" is not a subject artifact`);
      }
      if (!subjectId) {
        throw new InvalidScopeError(`Subject artifact "${name}" requires a subject id`);
      }
      return { scope, name, subjectId, path: join(this.subjectDirectory(subjectId), file) };
    }

    throw new InvalidScopeError(`Unknown artifact scope "${String(scope)}"`);
  }

  subjectDirectory(subjectId: string): string {
    return join(this.roots.subjectRoot, subjectDirectoryName(subjectId));
  }

  async exists(location: Location): Promise<boolean> {
    try {
      const stats = await stat(location.path);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  async ensureDirectory(location: Location): Promise<void> {
    await mkdir(dirname(location.path), { recursive: true });
  }

  sharedLocations(): Record<SharedArtifactName, Location> {
    return {
      compiledCircuit: this.resolve('shared', 'compiledCircuit'),
      settings: this.resolve('shared', 'settings'),
      provingKey: this.resolve('shared', 'provingKey'),
      verificationKey: this.resolve('shared', 'verificationKey'),
      referenceString: this.resolve('shared', 'referenceString'),
    };
  }

  async missingShared(): Promise<SharedArtifactName[]> {
    const locations = this.sharedLocations();
    const missing: SharedArtifactName[] = [];
    for (const name of SHARED_ARTIFACTS) {
      if (!(await this.exists(locations[name]))) {
        missing.push(name);
      }
    }
    return missing;
  }
}

function lookup(table: Readonly<Record<string, string>>, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, name) ? table[name] : undefined;
}
