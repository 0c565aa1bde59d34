import { InsufficientSlateError, InvalidConfigurationError, InvalidSlateError, UnknownDocumentError } from './errors';

export function validateSlateSize(slateSize: number, universeSize: number): number {
  if (!Number.isInteger(slateSize) || slateSize < 1) {
    throw new InvalidConfigurationError(`slateSize must be an integer >= 1, got ${slateSize}.`);
  }
  if (slateSize > universeSize) {
    throw new InvalidConfigurationError(
      `slateSize (${slateSize}) cannot exceed number of documents (${universeSize}).`,
    );
  }
  return slateSize;
}

export function validateUniqueIds(docIds: readonly string[]): void {
  if (!docIds.length) {
    throw new InvalidConfigurationError('At least one document id is required.');
  }
  const seen = new Set<string>();
  docIds.forEach((docId) => {
    if (seen.has(docId)) {
      throw new InvalidConfigurationError(`Duplicate document id detected: ${docId}`);
    }
    seen.add(docId);
  });
}

/**
 * Keeps the first `slateSize` ids of a proposed slate. Ids past the cut are dropped unchecked.
 */
export function normalizeSlate(docIds: readonly string[], slateSize: number): string[] {
  const unique: string[] = [];
  const seen = new Set<string>();
  for (const docId of docIds) {
    if (seen.has(docId)) {
      throw new InvalidSlateError(`Duplicate document id '${docId}' inside slate.`);
    }
    seen.add(docId);
    unique.push(docId);
    if (unique.length === slateSize) {
      break;
    }
  }
  if (unique.length < slateSize) {
    throw new InsufficientSlateError(unique.length, slateSize);
  }
  return unique;
}

export function ensureKnownDocuments(slate: readonly string[], known: ReadonlySet<string>): void {
  const missing = slate.filter((docId) => !known.has(docId));
  if (missing.length) {
    throw new UnknownDocumentError(missing);
  }
}
