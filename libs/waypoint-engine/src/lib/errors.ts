export type FlowErrorCode =
  | 'flow_exhausted'
  | 'missing_step_value'
  | 'decode_failed'
  | 'encode_failed'
  | 'unsupported_stream'
  | 'duplicate_label'
  | 'invalid_label';

export class FlowError extends Error {
  constructor(
    readonly code: FlowErrorCode,
    message: string,
    readonly label?: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Traversal reached a finished workflow while a step was still expected. */
export class FlowExhaustedError extends FlowError {
  constructor(label?: string, message?: string) {
    super(
      'flow_exhausted',
      message ?? (label ? `Workflow finished before reaching step "${label}"` : 'Workflow has no remaining step'),
      label,
    );
  }
}

/** A step before the target has no value in the session. */
export class MissingStepValueError extends FlowError {
  constructor(label: string, readonly target: string) {
    super('missing_step_value', `No stored value for step "${label}" (requested "${target}")`, label);
  }
}

export class DecodeError extends FlowError {
  constructor(message: string, label?: string, details?: unknown) {
    super('decode_failed', message, label, details);
  }
}

/** A step produced a value its codec cannot store. */
export class EncodeError extends FlowError {
  constructor(message: string, label?: string, details?: unknown) {
    super('encode_failed', message, label, details);
  }
}

export class UnsupportedStreamError extends FlowError {
  constructor(label: string) {
    super('unsupported_stream', `Step "${label}" does not accept streams`, label);
  }
}

export class DuplicateLabelError extends FlowError {
  constructor(label: string, readonly path: string[]) {
    super('duplicate_label', `Step "${label}" appears twice on path ${path.join(' -> ')}`, label, { path });
  }
}

export class InvalidLabelError extends FlowError {
  constructor(label: string) {
    super('invalid_label', `Invalid step label "${label}"`, label);
  }
}

export const isFlowError = (error: unknown): error is FlowError => error instanceof FlowError;
