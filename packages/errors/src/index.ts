export const ErrorCode = {
  MISSING_SHARED_ARTIFACTS: 'MISSING_SHARED_ARTIFACTS',
  MISSING_SUBJECT_INPUT: 'MISSING_SUBJECT_INPUT',
  MISSING_MODEL: 'MISSING_MODEL',
  EXTERNAL_TOOL: 'EXTERNAL_TOOL',
  INCONSISTENT_TOOL_OUTPUT: 'INCONSISTENT_TOOL_OUTPUT',
  VERIFICATION_FAILED: 'VERIFICATION_FAILED',
  STAGE_FAILED: 'STAGE_FAILED',
  INVALID_SCOPE: 'INVALID_SCOPE',
  CONFIG: 'CONFIG',
  USAGE: 'USAGE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MissingSharedArtifactsError extends PipelineError {
  constructor(readonly missing: readonly string[]) {
    super(
      ErrorCode.MISSING_SHARED_ARTIFACTS,
      `Shared circuit artifacts missing: ${missing.join(', ')}. Run "zkscore setup-common" first.`
    );
  }
}

export class MissingSubjectInputError extends PipelineError {
  constructor(readonly path: string) {
    super(ErrorCode.MISSING_SUBJECT_INPUT, `Subject input not found: ${path}`);
  }
}

export class MissingModelError extends PipelineError {
  constructor(readonly path: string) {
    super(ErrorCode.MISSING_MODEL, `Model file not found: ${path}`);
  }
}

/**
 * The engine exited unsuccessfully. `exitCode` is null when the process
 * never exited on its own (spawn failure, timeout, signal).
 */
export class ExternalToolError extends PipelineError {
  constructor(
    readonly stage: string,
    readonly exitCode: number | null,
    readonly stderrExcerpt: string,
    options?: { cause?: unknown }
  ) {
    const status = exitCode === null ? 'did not exit cleanly' : `exited with code ${exitCode}`;
    const detail = stderrExcerpt.trim() ? `: ${stderrExcerpt.trim()}` : '';
    super(ErrorCode.EXTERNAL_TOOL, `${stage} ${status}${detail}`, options);
  }
}

/**
 * The engine reported success but did not leave the files its contract names.
 */
export class InconsistentToolOutputError extends PipelineError {
  constructor(
    readonly stage: string,
    readonly missing: readonly string[]
  ) {
    super(
      ErrorCode.INCONSISTENT_TOOL_OUTPUT,
      `${stage} reported success but did not produce: ${missing.join(', ')}`
    );
  }
}

export class VerificationFailedError extends PipelineError {
  constructor(
    readonly proofPath: string,
    readonly detail: string
  ) {
    const suffix = detail.trim() ? `: ${detail.trim()}` : '';
    super(ErrorCode.VERIFICATION_FAILED, `Proof did not verify (${proofPath})${suffix}`);
  }
}

export class StageFailedError extends PipelineError {
  constructor(
    readonly stage: string,
    cause: unknown
  ) {
    super(ErrorCode.STAGE_FAILED, `${stage} failed: ${describeError(cause)}`, { cause });
  }
}

export class InvalidScopeError extends PipelineError {
  constructor(message: string) {
    super(ErrorCode.INVALID_SCOPE, message);
  }
}

export class ConfigError extends PipelineError {
  constructor(readonly issues: readonly string[]) {
    super(ErrorCode.CONFIG, `Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}

export class UsageError extends PipelineError {
  constructor(message: string) {
    super(ErrorCode.USAGE, message);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
