import type { ErrorKind } from '../shared/types/artifact.js';

export class PipelineError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly key: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Partition name carries no usable date token. The partition is excluded, the run continues. */
export class ParseError extends PipelineError {
  constructor(name: string, message: string) {
    super('parse', name, message);
  }
}

export class FetchError extends PipelineError {
  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super('fetch', key, message, options);
  }
}

export class EncodeError extends PipelineError {
  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super('encode', key, message, options);
  }
}

/** A remote or local tier could not answer. Callers degrade to "absent" or skip the write. */
export class TierUnavailableError extends PipelineError {
  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super('tier', key, message, options);
  }
}

/** Loading or persisting the processing state failed. Fatal for the run. */
export class StateStoreError extends PipelineError {
  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super('state', key, message, options);
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
