// node/src/utils/errors.ts: failure taxonomy for ticket resolution

export type PipelineErrorCode =
  | 'input_error'
  | 'generation_format_error'
  | 'validation_error'
  | 'collaborator_error';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Blank ticket or query reached a stage that needs text. */
export class InputError extends PipelineError {
  readonly code = 'input_error';
}

export type GenerationFormatReason = 'invalid_json' | 'missing_answer';

/** Generation backend ignored the strict JSON contract. */
export class GenerationFormatError extends PipelineError {
  readonly code = 'generation_format_error';

  constructor(
    readonly reason: GenerationFormatReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Final response broke the output contract. */
export class ValidationError extends PipelineError {
  readonly code = 'validation_error';

  constructor(
    message: string,
    readonly issues: ValidationIssue[],
  ) {
    super(message);
  }
}

/**
 * Raised by collaborator adapters for problems they detect themselves
 * (malformed payloads, non-finite scores, missing credentials). Transport
 * errors from axios/openai are not wrapped.
 */
export class CollaboratorError extends PipelineError {
  readonly code = 'collaborator_error';

  constructor(
    readonly collaborator: 'vector_index' | 'embedder' | 'relevance_scorer' | 'llm',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
