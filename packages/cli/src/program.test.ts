import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CommanderError } from 'commander';
import { mkdir, writeFile, rm, readFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomBytes } from 'node:crypto';
import { silentLogger } from '@zkscore/config';
import { FakeEngine } from '@zkscore/prover-client';
import { buildProgram } from './program.js';

async function present(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('zkscore CLI', () => {
  let root: string;
  let engine: FakeEngine;

  // Runs the program in process against the fake engine and captures output
  async function runCLI(
    args: string[],
    env: Record<string, string> = {}
  ): Promise<{ stdout: string; stderr: string; exitCode: number }> {
    const out: string[] = [];
    const err: string[] = [];
    let exitCode = 0;

    const program = buildProgram({
      cwd: root,
      env,
      stdout: (line) => out.push(line),
      stderr: (line) => err.push(line),
      logger: silentLogger,
      setExitCode: (code) => {
        exitCode = code;
      },
      runner: engine,
    });
    for (const command of [program, ...program.commands]) {
      command.exitOverride().configureOutput({
        writeOut: (text) => out.push(text.trimEnd()),
        writeErr: (text) => err.push(text.trimEnd()),
      });
    }

    try {
      await program.parseAsync(args, { from: 'user' });
    } catch (error) {
      if (!(error instanceof CommanderError)) throw error;
      exitCode = error.exitCode;
    }
    return { stdout: out.join('\n'), stderr: err.join('\n'), exitCode };
  }

  async function setupCommon(): Promise<void> {
    await writeFile(join(root, 'model.onnx'), 'onnx');
    const { exitCode } = await runCLI(['setup-common', '--model', 'model.onnx', '--srs', 'proof_generation/kzg.srs']);
    expect(exitCode).toBe(0);
    engine.reset();
  }

  beforeEach(async () => {
    root = join(tmpdir(), `zkscore-cli-test-${randomBytes(4).toString('hex')}`);
    await mkdir(root, { recursive: true });
    engine = new FakeEngine();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('--version', () => {
    it('should display the version', async () => {
      const { stdout, exitCode } = await runCLI(['--version']);

      expect(exitCode).toBe(0);
      expect(stdout).toBe('0.1.0');
    });
  });

  describe('setup-common', () => {
    it('should require --srs', async () => {
      const { stderr, exitCode } = await runCLI(['setup-common', '--model', 'model.onnx']);

      expect(exitCode).toBe(1);
      expect(stderr).toContain("required option '--srs <path>' not specified");
      expect(engine.calls).toHaveLength(0);
    });

    it('should build the shared artifacts', async () => {
      await writeFile(join(root, 'model.onnx'), 'onnx');

      const { stdout, exitCode } = await runCLI([
        'setup-common',
        '--model', 'model.onnx',
        '--srs', 'proof_generation/kzg.srs',
      ]);

      expect(exitCode).toBe(0);
      expect(stdout.split('\n')).toEqual([
        '[RAN] compile-circuit: circuit compiled',
        '[RAN] reference-string: reference string downloaded',
        '[RAN] setup: keys generated',
        'Shared circuit artifacts ready.',
      ]);
      expect(await present(join(root, 'proof_generation', 'pk.key'))).toBe(true);
    });

    it('should skip every step on a second run', async () => {
      await setupCommon();

      const { stdout, exitCode } = await runCLI([
        'setup-common',
        '--model', 'model.onnx',
        '--srs', 'proof_generation/kzg.srs',
      ]);

      expect(exitCode).toBe(0);
      expect(stdout.split('\n')[1]).toBe(`[SKIP] reference-string: using cached ${join(root, 'proof_generation', 'kzg.srs')}`);
      expect(engine.calls).toHaveLength(0);
    });

    it('should name the failing stage', async () => {
      const { stderr, exitCode } = await runCLI(['setup-common', '--model', 'absent.onnx', '--srs', 'kzg.srs']);

      expect(exitCode).toBe(1);
      expect(stderr).toBe(`Error: stage "compile-circuit" failed: Model file not found: ${join(root, 'absent.onnx')}`);
    });

    it('should honour --shared-root', async () => {
      await writeFile(join(root, 'model.onnx'), 'onnx');

      const { exitCode } = await runCLI([
        '--shared-root', 'shared',
        'setup-common',
        '--model', 'model.onnx',
        '--srs', 'shared/kzg.srs',
      ]);

      expect(exitCode).toBe(0);
      expect(await present(join(root, 'shared', 'model.compiled'))).toBe(true);
      expect(await present(join(root, 'proof_generation'))).toBe(false);
    });
  });

  describe('prepare-input', () => {
    it('should write the subject input file', async () => {
      const { stdout, exitCode } = await runCLI([
        'prepare-input', 'proofs/alice',
        '--features', '[0.5,0.8]',
        '--score', '0.63',
      ]);

      expect(exitCode).toBe(0);
      expect(stdout).toBe(`Wrote ${join(root, 'proofs', 'alice', 'input.json')}`);
      expect(JSON.parse(await readFile(join(root, 'proofs', 'alice', 'input.json'), 'utf8'))).toEqual({
        input_data: [[0.5, 0.8]],
        input_shapes: [[2]],
        output_data: [[0.63]],
      });
    });

    it('should reject features that are not a number array', async () => {
      const { stderr, exitCode } = await runCLI(['prepare-input', 'proofs/alice', '--features', '[]']);

      expect(exitCode).toBe(1);
      expect(stderr).toBe('Error: --features must be a non-empty JSON array of numbers');
    });

    it('should reject a score that is not a number', async () => {
      const { stderr, exitCode } = await runCLI(['prepare-input', 'proofs/alice', '--features', '[1]', '--score', 'high']);

      expect(exitCode).toBe(1);
      expect(stderr).toBe('Error: --score must be a number, got "high"');
    });
  });

  describe('generate', () => {
    it('should prove a prepared subject', async () => {
      await setupCommon();
      await runCLI(['prepare-input', 'proofs/alice', '--features', '[0.5,0.8]']);

      const { stdout, exitCode } = await runCLI(['generate', 'proofs/alice']);

      expect(exitCode).toBe(0);
      expect(stdout.split('\n')).toEqual(['[PASS] alice', '  score reconciliation skipped: no metadata.json for subject']);
      expect(engine.steps()).toEqual(['gen-witness', 'prove', 'verify']);
    });

    it('should prove a subject directory named by address', async () => {
      await setupCommon();
      await runCLI(['prepare-input', 'proofs/0xabc123', '--features', '[0.5,0.8]']);

      const { stdout, exitCode } = await runCLI(['generate', 'proofs/0xabc123']);

      expect(exitCode).toBe(0);
      expect(stdout.split('\n')[0]).toBe('[PASS] 0xabc123');
      expect(await present(join(root, 'proofs', '0xabc123', 'proof.json'))).toBe(true);
      expect(await present(join(root, 'proofs', 'abc123'))).toBe(false);
    });

    it('should fail without shared artifacts and call nothing', async () => {
      await runCLI(['prepare-input', 'proofs/alice', '--features', '[0.5,0.8]']);

      const { stdout, stderr, exitCode } = await runCLI(['generate', 'proofs/alice']);

      expect(exitCode).toBe(1);
      expect(stdout).toBe(
        '[FAIL] alice: stage "preconditions" failed: Shared circuit artifacts missing: compiledCircuit, settings, ' +
          'provingKey, verificationKey, referenceString. Run "zkscore setup-common" first.'
      );
      expect(stderr).toBe('Error: 1 of 1 subject(s) failed');
      expect(engine.calls).toHaveLength(0);
    });

    it('should name the stage that failed', async () => {
      await setupCommon();
      await runCLI(['prepare-input', 'proofs/alice', '--features', '[0.5,0.8]']);
      engine.configure({ verifies: false });

      const { stdout, exitCode } = await runCLI(['generate', 'proofs/alice']);

      expect(exitCode).toBe(1);
      expect(stdout.split('\n')[0]).toBe(
        `[FAIL] alice: stage "verify" failed: Proof did not verify (${join(root, 'proofs', 'alice', 'proof.json')}): verified: false`
      );
    });

    it('should emit JSON with --json', async () => {
      await setupCommon();
      await runCLI(['prepare-input', 'proofs/alice', '--features', '[0.5,0.8]']);

      const { stdout, exitCode } = await runCLI(['--json', 'generate', 'proofs/alice', '--generate-contract']);

      expect(exitCode).toBe(0);
      const report = JSON.parse(stdout);
      expect(report.success).toBe(true);
      expect(report.subjects[0].subjectId).toBe('alice');
      expect(report.subjects[0].stages.map((s: { stage: string }) => s.stage)).toEqual([
        'generate-witness',
        'prove',
        'stage-artifacts',
        'verify',
        'create-verifier',
        'encode-calldata',
      ]);
    });

    it('should reject a malformed concurrency', async () => {
      const { stderr, exitCode } = await runCLI(['generate', 'proofs/alice', '--concurrency', 'many']);

      expect(exitCode).toBe(1);
      expect(stderr.startsWith('Error: Invalid invocation:')).toBe(true);
      expect(engine.calls).toHaveLength(0);
    });
  });

  describe('run', () => {
    it('should require some input', async () => {
      const { stderr, exitCode } = await runCLI(['run']);

      expect(exitCode).toBe(1);
      expect(stderr).toBe('Error: Invalid invocation: at least one subject directory is required');
    });

    it('should dispatch to common setup', async () => {
      await writeFile(join(root, 'model.onnx'), 'onnx');

      const { exitCode } = await runCLI(['run', '--model', 'model.onnx', '--srs', 'proof_generation/kzg.srs']);

      expect(exitCode).toBe(0);
      expect(engine.steps()).toEqual(['gen-settings', 'compile-circuit', 'get-srs', 'setup']);
    });
  });

  describe('verify and register', () => {
    beforeEach(async () => {
      engine.configure({ proofInstances: [['0xae278502' + '0'.repeat(56)]] });
      await setupCommon();
      await runCLI(['prepare-input', 'proofs/alice', '--features', '[0.5,0.8]']);
      await runCLI(['generate', 'proofs/alice']);
      engine.reset();
    });

    it('should verify a generated proof', async () => {
      const { stdout, exitCode } = await runCLI(['verify', 'proofs/alice']);

      expect(exitCode).toBe(0);
      expect(stdout).toBe('Proof verified: alice');
    });

    it('should register a generated proof', async () => {
      const { stdout, exitCode } = await runCLI(['register', 'proofs/alice']);

      expect(exitCode).toBe(0);
      expect(stdout.split('\n')[2]).toBe('  public input: 42280878 (0x28527ae)');
      expect(await present(join(root, 'proof_registry', 'alice.json'))).toBe(true);
    });
  });

  describe('doctor', () => {
    it('should report each check', async () => {
      const { stdout, exitCode } = await runCLI(['doctor']);

      expect(exitCode).toBe(0);
      expect(stdout).toContain('[PASS] Proving engine: ezkl: fake-engine 0.0.0');
      expect(stdout).toContain('[WARN] Shared artifacts:');
      expect(stdout.split('\n').at(-1)).toBe('All checks passed!');
    });

    it('should read the engine command from the environment', async () => {
      const { stdout } = await runCLI(['doctor'], { ZKSCORE_ENGINE: 'ezkl-nightly' });

      expect(stdout).toContain('[PASS] Proving engine: ezkl-nightly: fake-engine 0.0.0');
      expect(engine.calls[0]?.command).toBe('ezkl-nightly');
    });
  });

  describe('configuration errors', () => {
    it('should fail on a missing --config file', async () => {
      const { stderr, exitCode } = await runCLI(['--config', 'missing.json', 'doctor']);

      expect(exitCode).toBe(1);
      expect(stderr.startsWith(`Error: Invalid configuration:\n  cannot read ${join(root, 'missing.json')}`)).toBe(true);
    });
  });
});
