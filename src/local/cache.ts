import type { EntryMetadata } from '../types.js';

/**
 * In-memory mirror of entry metadata, shared by the services of one
 * process. Holders call `retain()` and `release()`; the mirror empties when
 * the last holder lets go. Writers update disk first and this mirror second.
 */
export class EntryInfoCache {
  private entries = new Map<number, EntryMetadata>();
  private refs = 0;

  retain(): this {
    this.refs++;
    return this;
  }

  release(): void {
    if (this.refs === 0) return;
    this.refs--;
    if (this.refs === 0) this.invalidate();
  }

  get refCount(): number {
    return this.refs;
  }

  get(id: number): EntryMetadata | null {
    return this.entries.get(id) ?? null;
  }

  set(id: number, metadata: EntryMetadata): void {
    this.entries.set(id, metadata);
  }

  delete(id: number): void {
    this.entries.delete(id);
  }

  invalidate(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
