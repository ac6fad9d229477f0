import {
  errorMessage,
  fail,
  ok,
  type BackupDataSource,
  type ChangeWatch,
  type ManagedBackupCategory,
  type Result,
} from '../types/backup.js';

export interface JsonBackupSourceOptions<T> {
  category: ManagedBackupCategory;
  changes: readonly ChangeWatch[];
  /** Current value to back up. */
  read: () => Promise<T> | T;
  /** Apply a restored value. */
  write: (value: T) => Promise<void> | void;
  /** Check restored JSON before it is written. */
  validate: (value: unknown) => value is T;
  /** Strip fields that must never leave the device (e.g. a PIN) before backup and after restore. */
  redact?: (value: T) => T;
}

/**
 * Data source for categories whose state is a JSON-serializable value.
 */
export function createJsonBackupSource<T>(options: JsonBackupSourceOptions<T>): BackupDataSource {
  const redact = options.redact ?? ((value: T) => value);

  return {
    category: options.category,
    changes: options.changes,

    async snapshotBytes(): Promise<Uint8Array> {
      const value = redact(await options.read());
      return new Uint8Array(Buffer.from(JSON.stringify(value), 'utf8'));
    },

    async applyBytes(bytes: Uint8Array): Promise<Result> {
      let parsed: unknown;
      try {
        parsed = JSON.parse(Buffer.from(bytes).toString('utf8'));
      } catch (err) {
        return fail(`Invalid ${options.category} backup: ${errorMessage(err)}`);
      }

      if (!options.validate(parsed)) {
        return fail(`Invalid ${options.category} backup: unexpected shape.`);
      }

      try {
        await options.write(redact(parsed));
      } catch (err) {
        return fail(`Failed to write ${options.category} backup: ${errorMessage(err)}`);
      }
      return ok(undefined);
    },
  };
}
