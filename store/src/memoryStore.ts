import { emptyTrackerDocument, type TrackerDocument } from '@turbinetrack/shared';

import { DocumentStoreError } from './errors.js';
import type { DocumentStore } from './types.js';

// In-process store for tests and scripts. Keeps a detached copy of every save.
export class MemoryDocumentStore implements DocumentStore {
  saveCount = 0;
  failNextSave = false;
  private snapshot: TrackerDocument;

  constructor(initial?: TrackerDocument) {
    this.snapshot = structuredClone(initial ?? emptyTrackerDocument());
  }

  load(): TrackerDocument {
    return structuredClone(this.snapshot);
  }

  save(document: TrackerDocument): void {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new DocumentStoreError('store_unwritable', 'memory store rejected the write');
    }
    this.snapshot = structuredClone(document);
    this.saveCount += 1;
  }

  get persisted(): TrackerDocument {
    return structuredClone(this.snapshot);
  }
}
