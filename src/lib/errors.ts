export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface ChunkFailure {
  chunkId: string;
  chunkIndex: number;
  cause: string;
  message: string;
}

/** Raised when a transcript yields nothing usable: chunking threw or every chunk failed. */
export class PipelineFailureError extends Error {
  constructor(
    message: string,
    readonly transcriptId: string,
    readonly failures: ChunkFailure[] = [],
    readonly chunksTotal = 0
  ) {
    super(message);
    this.name = "PipelineFailureError";
  }
}

export class StoreError extends Error {
  constructor(
    message: string,
    readonly table: string,
    readonly operation: string,
    readonly code?: string
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === "string" && error ? error : fallback;
}
