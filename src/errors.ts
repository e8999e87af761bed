export type PipelineErrorKind = 'transport' | 'recognition' | 'agent_service' | 'tool' | 'synthesis';

export class PipelineError extends Error {
  public readonly kind: PipelineErrorKind;
  public readonly retryable: boolean;

  constructor(
    kind: PipelineErrorKind,
    message: string,
    options: { cause?: unknown; retryable?: boolean } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.retryable = options.retryable ?? false;
  }
}

/** Stream drop or codec failure on the telephony media stream. */
export class TransportError extends PipelineError {
  constructor(message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super('transport', message, options);
  }
}

export class RecognitionError extends PipelineError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('recognition', message, options);
  }
}

export class AgentServiceError extends PipelineError {
  public readonly status?: number;

  constructor(message: string, options: { cause?: unknown; retryable?: boolean; status?: number } = {}) {
    super('agent_service', message, options);
    this.status = options.status;
  }
}

export class ToolError extends PipelineError {
  public readonly toolName: string;
  public readonly timedOut: boolean;

  constructor(toolName: string, message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super('tool', message, options);
    this.toolName = toolName;
    this.timedOut = options.timedOut ?? false;
  }
}

export class SynthesisError extends PipelineError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('synthesis', message, options);
  }
}

export function isAbortError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === 'AbortError' || err.name === 'TimeoutError' || /aborted|AbortError/i.test(err.message))
  );
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
