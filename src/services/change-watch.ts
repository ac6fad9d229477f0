import type { ChangeFeed, ChangeWatch } from '../types/backup.js';

const DEFAULT_EXCLUDED_KEYS = ['backupStatuses'] as const;

export interface WatchChangesOptions<T> {
  /** Consecutive emissions with equal fingerprints count as one change. */
  fingerprint?: (value: T) => string;
  label?: string;
}

/** Wrap a typed feed for a data source's `changes` list. */
export function watchChanges<T>(feed: ChangeFeed<T>, options: WatchChangesOptions<T> = {}): ChangeWatch {
  const { fingerprint, label } = options;
  return {
    label,
    subscribe: (listener) => feed.subscribe((value) => listener(fingerprint?.(value))),
  };
}

function stableStringify(value: unknown, excluded: ReadonlySet<string>): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'undefined';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item, excluded)).join(',')}]`;
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const parts = Object.keys(record)
    .filter((key) => !excluded.has(key))
    .sort()
    .map((key) => `${JSON.stringify(key)}:${stableStringify(record[key], excluded)}`);
  return `{${parts.join(',')}}`;
}

/**
 * Fingerprint for feeds that watch an aggregate application cache. Keys in
 * `excludedKeys` are ignored at every depth, so writing backup statuses into
 * the cache never registers as a metadata change.
 */
export function createCacheFingerprint(
  excludedKeys: readonly string[] = DEFAULT_EXCLUDED_KEYS,
): (value: unknown) => string {
  const excluded = new Set(excludedKeys);
  return (value) => stableStringify(value, excluded);
}

/** Key-order independent JSON fingerprint. */
export const jsonFingerprint: (value: unknown) => string = createCacheFingerprint([]);
