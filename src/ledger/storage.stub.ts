import { ConditionalWriteResult, VersionedContent, VersionedStore } from './storage';
import { VersionConflictError } from '../core/errors';

/** In-process store for tests and dry runs; versions are a write counter. */
export class InMemoryVersionedStore implements VersionedStore {
  readonly label = 'memory';
  private content: string;
  private version: number;
  writes = 0;
  conflicts = 0;

  constructor(initial = '') {
    this.content = initial;
    this.version = initial ? 1 : 0;
  }

  private token() {
    return this.version === 0 ? '' : `v${this.version}`;
  }

  async read(): Promise<VersionedContent> {
    return { content: this.content, version: this.token() };
  }

  async conditionalWrite(content: string, expectedVersion: string): Promise<ConditionalWriteResult> {
    if (expectedVersion !== this.token()) {
      this.conflicts += 1;
      return { ok: false, conflict: new VersionConflictError(expectedVersion) };
    }
    this.content = content;
    this.version += 1;
    this.writes += 1;
    return { ok: true, version: this.token() };
  }

  /** Overwrites the document out of band, as another writer would. */
  forceWrite(content: string) {
    this.content = content;
    this.version += 1;
  }

  snapshot() {
    return this.content;
  }
}
