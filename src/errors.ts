/**
 * Error taxonomy for the ingest pipeline.
 *
 * Unit-fatal: IntegrityError, StorageError, SnapshotFormatError.
 * Absorbed and logged: ReferenceMissingError, MalformedTokenWarning.
 * TransientRetrievalError only comes out of the extractor.
 */

/** An upsert attempted a row but no row exists for its external id afterwards. */
export class IntegrityError extends Error {
  constructor(
    public readonly entity: 'team' | 'player' | 'game',
    public readonly externalId: number,
  ) {
    super(`No ${entity} row found for external id ${externalId} after upsert`);
    this.name = 'IntegrityError';
  }
}

/** A game points at a team the unit never resolved, or at no team at all (null). */
export class ReferenceMissingError extends Error {
  constructor(
    public readonly gameExternalId: number,
    public readonly teamExternalId: number | null,
  ) {
    super(
      teamExternalId === null
        ? `Game ${gameExternalId} has no team reference`
        : `Game ${gameExternalId} references unresolved team ${teamExternalId}`,
    );
    this.name = 'ReferenceMissingError';
  }
}

export class MalformedTokenWarning extends Error {
  constructor(public readonly token: string) {
    super(`Source token "${token}" does not encode a <start>_<end> date range`);
    this.name = 'MalformedTokenWarning';
  }
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class SnapshotFormatError extends Error {
  constructor(
    public readonly filePath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Snapshot ${filePath} is malformed: ${detail}`, options);
    this.name = 'SnapshotFormatError';
  }
}

export class TransientRetrievalError extends Error {
  constructor(
    public readonly url: string,
    public readonly statusCode: number | null,
    options?: { cause?: unknown },
  ) {
    super(
      statusCode === null
        ? `Request to ${url} failed before a response arrived`
        : `Request to ${url} failed with status ${statusCode}`,
      options,
    );
    this.name = 'TransientRetrievalError';
  }
}
