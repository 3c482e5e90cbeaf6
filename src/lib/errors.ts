export type FailureKind = 'source-unavailable' | 'decode-error' | 'destination-unavailable' | 'metadata-error';

type ErrorData = Record<string, string | number | boolean | undefined>;

export class ConfigError extends Error {
  readonly kind = 'config-missing';

  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export const errorName = (err: unknown) => (err instanceof Error ? err.name : typeof err);

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

export class StepError extends Error {
  readonly kind: FailureKind;

  readonly objectKey: string;

  readonly data: ErrorData;

  constructor(kind: FailureKind, message: string, objectKey: string, data: ErrorData = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StepError';
    this.kind = kind;
    this.objectKey = objectKey;
    this.data = data;
  }

  // Classifies whatever a store or the codec threw, keeping the original as the cause
  static wrap(kind: FailureKind, objectKey: string, cause: unknown) {
    if (cause instanceof StepError) {
      return cause;
    }

    return new StepError(kind, errorMessage(cause), objectKey, { error: errorName(cause) }, { cause });
  }
}

// Matched by name so the check survives the error crossing module instances
export const isStepError = (error: unknown) => error instanceof Error && error.name === 'StepError';
