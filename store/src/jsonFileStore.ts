import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { emptyTrackerDocument, parseTrackerDocument, type TrackerDocument } from '@turbinetrack/shared';

import { DocumentStoreError } from './errors.js';
import type { DocumentStore } from './types.js';

const JSON_INDENT = 4;

export class JsonFileDocumentStore implements DocumentStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  load(): TrackerDocument {
    if (!existsSync(this.filePath)) return emptyTrackerDocument();

    let text: string;
    try {
      text = readFileSync(this.filePath, 'utf8');
    } catch (e) {
      throw new DocumentStoreError('store_unreadable', `cannot read ${this.filePath}: ${String(e)}`, {
        filePath: this.filePath,
        cause: e,
      });
    }
    if (!text.trim()) return emptyTrackerDocument();

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      throw new DocumentStoreError('store_corrupt', `invalid JSON in ${this.filePath}`, { filePath: this.filePath, cause: e });
    }

    const parsed = parseTrackerDocument(raw);
    if (!parsed.ok) {
      throw new DocumentStoreError('store_corrupt', `invalid document in ${this.filePath}: ${parsed.error}`, {
        filePath: this.filePath,
      });
    }
    return parsed.document;
  }

  save(document: TrackerDocument): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify(document, null, JSON_INDENT));
    } catch (e) {
      throw new DocumentStoreError('store_unwritable', `cannot write ${this.filePath}: ${String(e)}`, {
        filePath: this.filePath,
        cause: e,
      });
    }
  }
}
