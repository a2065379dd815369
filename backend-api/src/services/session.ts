import type { TrackerDocument } from '@turbinetrack/shared';
import type { DocumentStore } from '@turbinetrack/store';

// The in-memory document and the store it is saved to. Passed explicitly to every operation.
export type TrackerSession = {
  document: TrackerDocument;
  store: DocumentStore;
};

export function openSession(store: DocumentStore): TrackerSession {
  return { document: store.load(), store };
}

// Exactly one save per successful mutation. When the store throws, the caller's
// in-memory change is undone before the error propagates.
export function persistOrRevert(session: TrackerSession, revert: () => void): void {
  try {
    session.store.save(session.document);
  } catch (e) {
    revert();
    throw e;
  }
}

export function appendAndPersist<T>(session: TrackerSession, collection: T[], item: T): void {
  collection.push(item);
  persistOrRevert(session, () => {
    const idx = collection.lastIndexOf(item);
    if (idx >= 0) collection.splice(idx, 1);
  });
}
