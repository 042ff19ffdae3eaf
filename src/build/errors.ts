export type FailureCategory =
  | 'base_image'
  | 'package_install'
  | 'dependency_install'
  | 'browser_install'
  | 'missing_input'
  | 'command';

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ManifestError';
  }
}

export class ManifestValidationError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Manifest is invalid:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
    this.name = 'ManifestValidationError';
  }
}

/**
 * Raised by a step implementation. The engine wraps it in BuildStepError.
 */
export class StepError extends Error {
  constructor(
    public readonly category: FailureCategory,
    message: string,
  ) {
    super(message);
    this.name = 'StepError';
  }
}

export class BuildStepError extends Error {
  constructor(
    public readonly step: string,
    public readonly kind: string,
    public readonly category: FailureCategory,
    cause: unknown,
  ) {
    super(`Step "${step}" (${kind}) failed [${category}]: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'BuildStepError';
  }
}

export class BuildAbortedError extends Error {
  constructor(
    public readonly step: string,
    during = false,
  ) {
    super(`Build aborted ${during ? 'during' : 'before'} step "${step}"`);
    this.name = 'BuildAbortedError';
  }
}
