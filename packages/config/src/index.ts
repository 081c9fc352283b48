import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import { ConfigError } from '@zkscore/errors';

export const CONFIG_FILE_NAME = 'zkscore.config.json';

export const ProverStepSchema = z.enum([
  'gen-settings',
  'calibrate-settings',
  'compile-circuit',
  'get-srs',
  'setup',
  'gen-witness',
  'prove',
  'verify',
  'create-evm-verifier',
  'encode-evm-calldata',
  'version',
]);

export type ProverStep = z.infer<typeof ProverStepSchema>;

export const EngineConfigSchema = z.object({
  command: z.string().min(1).default('ezkl'),
  defaultTimeoutMs: z.number().int().positive().default(600_000),
  timeouts: z.record(ProverStepSchema, z.number().int().positive()).default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const ScoringConfigSchema = z.object({
  // Field-encoding factor the engine applies to the scaled score.
  scaleDenominator: z.number().positive().default(67_219),
  // Upstream metadata stores scores on a 0..scoreRange scale.
  scoreRange: z.number().positive().default(1000),
  tolerance: z.number().nonnegative().default(0.005),
});

export type ScoringConfig = z.infer<typeof ScoringConfigSchema>;

export const PipelineConfigSchema = z.object({
  sharedRoot: z.string().min(1).default('proof_generation'),
  subjectRoot: z.string().min(1).default('proofs'),
  registryRoot: z.string().min(1).default('proof_registry'),
  referenceStringPath: z.string().min(1).optional(),
  engine: EngineConfigSchema.default({}),
  scoring: ScoringConfigSchema.default({}),
  modelVersion: z.string().default('1.0.0'),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function timeoutFor(engine: EngineConfig, step: ProverStep): number {
  return engine.timeouts[step] ?? engine.defaultTimeoutMs;
}

export interface LoadConfigOptions {
  cwd: string;
  configPath?: string;
  env?: Record<string, string | undefined>;
  overrides?: ConfigOverrides;
}

export interface ConfigOverrides {
  sharedRoot?: string;
  subjectRoot?: string;
  registryRoot?: string;
  referenceStringPath?: string;
  engineCommand?: string;
}

/**
 * Build a PipelineConfig from (lowest to highest precedence) the config file,
 * ZKSCORE_* environment variables and explicit overrides. Every path in the
 * result is absolute, resolved against `cwd`.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<PipelineConfig> {
  const fileInput = await readConfigFile(options.cwd, options.configPath);
  const merged = applyOverrides(applyEnv(fileInput, options.env ?? {}), options.overrides ?? {});

  const parsed = PipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  return absolutize(parsed.data, options.cwd);
}

async function readConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown>> {
  const path = configPath ? resolve(cwd, configPath) : join(cwd, CONFIG_FILE_NAME);
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT' && !configPath) {
      return {};
    }
    throw new ConfigError([`cannot read ${path}: ${(error as Error).message}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError([`${path} is not valid JSON: ${(error as Error).message}`]);
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError([`${path} must contain a JSON object`]);
  }
  return { ...parsed };
}

function applyEnv(
  input: Record<string, unknown>,
  env: Record<string, string | undefined>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...input };
  if (env['ZKSCORE_SHARED_ROOT']) result['sharedRoot'] = env['ZKSCORE_SHARED_ROOT'];
  if (env['ZKSCORE_SUBJECT_ROOT']) result['subjectRoot'] = env['ZKSCORE_SUBJECT_ROOT'];
  if (env['ZKSCORE_REGISTRY_ROOT']) result['registryRoot'] = env['ZKSCORE_REGISTRY_ROOT'];
  if (env['ZKSCORE_SRS_PATH']) result['referenceStringPath'] = env['ZKSCORE_SRS_PATH'];

  const engineCommand = env['ZKSCORE_ENGINE'];
  const timeout = env['ZKSCORE_TIMEOUT_MS'];
  if (engineCommand || timeout) {
    const engine = isRecord(result['engine']) ? { ...result['engine'] } : {};
    if (engineCommand) engine['command'] = engineCommand;
    // Left as a number-or-NaN so the schema reports a bad value.
    if (timeout) engine['defaultTimeoutMs'] = Number(timeout);
    result['engine'] = engine;
  }
  return result;
}

function applyOverrides(input: Record<string, unknown>, overrides: ConfigOverrides): Record<string, unknown> {
  const result: Record<string, unknown> = { ...input };
  if (overrides.sharedRoot) result['sharedRoot'] = overrides.sharedRoot;
  if (overrides.subjectRoot) result['subjectRoot'] = overrides.subjectRoot;
  if (overrides.registryRoot) result['registryRoot'] = overrides.registryRoot;
  if (overrides.referenceStringPath) result['referenceStringPath'] = overrides.referenceStringPath;
  if (overrides.engineCommand) {
    const engine = isRecord(result['engine']) ? { ...result['engine'] } : {};
    engine['command'] = overrides.engineCommand;
    result['engine'] = engine;
  }
  return result;
}

function absolutize(config: PipelineConfig, cwd: string): PipelineConfig {
  const abs = (p: string) => (isAbsolute(p) ? p : resolve(cwd, p));
  return {
    ...config,
    sharedRoot: abs(config.sharedRoot),
    subjectRoot: abs(config.subjectRoot),
    registryRoot: abs(config.registryRoot),
    ...(config.referenceStringPath && { referenceStringPath: abs(config.referenceStringPath) }),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
