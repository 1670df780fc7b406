export type ModelKind = 'intent' | 'ner';

/**
 * A model could not be loaded. Fatal: raised before the first turn is read.
 */
export class ModelUnavailableError extends Error {
  readonly model: ModelKind;

  constructor(model: ModelKind, message: string, options?: { cause?: unknown }) {
    super(`${model} model unavailable: ${message}`, options);
    this.name = 'ModelUnavailableError';
    this.model = model;
  }
}

/** A model artifact was found but its contents are unusable. */
export class ModelArtifactError extends Error {
  readonly artifact: string;

  constructor(artifact: string, message: string) {
    super(`${artifact}: ${message}`);
    this.name = 'ModelArtifactError';
    this.artifact = artifact;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
