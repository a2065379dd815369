import type { TrackerDocument } from '@turbinetrack/shared';

// Both calls are synchronous: a mutation and its save run on the same call stack.
export interface DocumentStore {
  load(): TrackerDocument;
  save(document: TrackerDocument): void;
}
