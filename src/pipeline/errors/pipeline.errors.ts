/**
 * Failures that make a stage unable to produce a valid artifact. Anything
 * else (one account, one query group, one chunk, one notification) is
 * logged and absorbed by the stage that hit it.
 */
export class PipelineFatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class LedgerCorruptError extends PipelineFatalError {
  constructor(
    readonly ledgerPath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`dedup ledger unreadable: ${ledgerPath} (${detail})`, options);
  }
}

export class OutputNotWritableError extends PipelineFatalError {
  constructor(
    readonly directory: string,
    options?: { cause?: unknown },
  ) {
    super(`output directory not writable: ${directory}`, options);
  }
}

export class ClassificationUnavailableError extends PipelineFatalError {
  constructor(readonly chunkCount: number) {
    super(
      `classification service unreachable for all ${chunkCount} chunk(s)`,
    );
  }
}

export class ArtifactNotFoundError extends PipelineFatalError {
  constructor(
    readonly kind: 'snapshot' | 'analysis',
    readonly ref: string,
  ) {
    super(`${kind} not found: ${ref}`);
  }
}
