import type {
  BackupDataSource,
  ChangeFeed,
  ExternalSyncSource,
  ManagedBackupCategory,
  Result,
} from '../../src/types/backup.js';
import { watchChanges } from '../../src/services/change-watch.js';

/** Replaying value holder: new subscribers get the current value first. */
export class ValueFeed<T> implements ChangeFeed<T> {
  #value: T;
  readonly #listeners: Set<(value: T) => void> = new Set();

  constructor(initial: T) {
    this.#value = initial;
  }

  get value(): T {
    return this.#value;
  }

  get subscriberCount(): number {
    return this.#listeners.size;
  }

  set(value: T): void {
    this.#value = value;
    for (const listener of [...this.#listeners]) {
      listener(value);
    }
  }

  subscribe(listener: (value: T) => void): () => void {
    this.#listeners.add(listener);
    listener(this.#value);
    return () => {
      this.#listeners.delete(listener);
    };
  }
}

export class FakeExternalSync implements ExternalSyncSource {
  readonly #listeners: Set<(syncedAt: number) => void> = new Set();

  complete(syncedAt: number): void {
    for (const listener of this.#listeners) {
      listener(syncedAt);
    }
  }

  onSyncCompleted(listener: (syncedAt: number) => void): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }
}

export interface FakeSource extends BackupDataSource {
  readonly feed: ValueFeed<string>;
  readonly applied: string[];
  snapshotCount: number;
  failSnapshot: string | null;
  failApply: string | null;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Data source whose state is a single string held in a `ValueFeed`.
 * `snapshotBytes` returns the current string, `applyBytes` writes it back.
 */
export function createFakeSource(category: ManagedBackupCategory, initial = `${category}-v0`): FakeSource {
  const feed = new ValueFeed(initial);
  const changes = [watchChanges(feed, { label: category })];

  const source: FakeSource = {
    category,
    changes,
    feed,
    applied: [],
    snapshotCount: 0,
    failSnapshot: null,
    failApply: null,

    async snapshotBytes(): Promise<Uint8Array> {
      source.snapshotCount += 1;
      if (source.failSnapshot) {
        throw new Error(source.failSnapshot);
      }
      return encoder.encode(feed.value);
    },

    async applyBytes(bytes: Uint8Array): Promise<Result> {
      if (source.failApply) {
        return { ok: false, error: source.failApply };
      }
      const value = decoder.decode(bytes);
      source.applied.push(value);
      feed.set(value);
      return { ok: true, value: undefined };
    },
  };

  return source;
}

export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}
